/**
 * Publisher Module
 *
 * The publish pipeline and the remote collaborators it drives.
 */

export * from './types.js';

export {
  PublishPipeline,
  DEFAULT_PIPELINE_CONFIG,
  needsReconciliation,
  type PipelineDependencies,
  type PipelineOptions,
} from './pipeline.js';

export { ImgbbMediaHost, DEFAULT_IMGBB_CONFIG, type ImgbbConfig } from './mediaHost.js';

export { TikTokContentApi, DEFAULT_CONTENT_API_CONFIG, type ContentApiConfig } from './contentApi.js';

export {
  ClaudeCaptionWriter,
  TemplateCaptionWriter,
  DEFAULT_CAPTION_RULES,
  anthropicCompletion,
  buildCaptionPrompt,
  formatCaption,
  parseCaption,
  validateCaption,
  type CaptionRules,
  type ClaudeCaptionConfig,
  type CompleteFn,
} from './captionWriter.js';
