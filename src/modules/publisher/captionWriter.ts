/**
 * Caption Writer
 *
 * Produces the post text for a catalog item. Claude writes it when an API
 * key is configured; a deterministic template is used otherwise, and
 * whenever the model's output cannot be used.
 */

import Anthropic from '@anthropic-ai/sdk';
import { errorMessage } from '../errors/index.js';
import type { CatalogItem } from '../catalog/types.js';
import type { Caption, CaptionWriter } from './types.js';

// =============================================================================
// CAPTION RULES
// =============================================================================

export interface CaptionRules {
  /** Required prefix for advertising disclosure */
  disclosure: string;
  maxBodyLength: number;
  minHashtags: number;
  maxHashtags: number;
}

export const DEFAULT_CAPTION_RULES: CaptionRules = {
  disclosure: 'PR',
  maxBodyLength: 300,
  minHashtags: 5,
  maxHashtags: 7,
};

const HASHTAG_PATTERN = /#[\p{L}\p{N}_]+/gu;

export function formatCaption(body: string, hashtags: string[]): Caption {
  const fullText = hashtags.length > 0 ? `${body}\n\n${hashtags.join(' ')}` : body;
  return { body, hashtags, fullText };
}

/**
 * Pull the Body: and Hashtags: sections out of a model response
 */
export function parseCaption(raw: string, maxHashtags = DEFAULT_CAPTION_RULES.maxHashtags): Caption {
  const bodyMatch = raw.match(/Body:[ \t]*\n?([\s\S]+?)(?=\n\s*Hashtags:|$)/i);
  const body = bodyMatch ? bodyMatch[1].trim() : '';

  const tagSection = raw.match(/Hashtags:([\s\S]*)$/i);
  const source = tagSection ? tagSection[1] : raw;
  const hashtags = [...new Set(source.match(HASHTAG_PATTERN) ?? [])].slice(0, maxHashtags);

  return formatCaption(body, hashtags);
}

/**
 * List every rule the caption breaks; empty means usable
 */
export function validateCaption(caption: Caption, rules: CaptionRules = DEFAULT_CAPTION_RULES): string[] {
  const problems: string[] = [];

  if (caption.body.length === 0) {
    problems.push('body is empty');
  }
  if (!caption.body.startsWith(rules.disclosure)) {
    problems.push(`body must start with "${rules.disclosure}"`);
  }
  if (caption.body.length > rules.maxBodyLength) {
    problems.push(`body is ${caption.body.length} characters (max ${rules.maxBodyLength})`);
  }
  if (caption.hashtags.length < rules.minHashtags || caption.hashtags.length > rules.maxHashtags) {
    problems.push(
      `${caption.hashtags.length} hashtags (expected ${rules.minHashtags}-${rules.maxHashtags})`
    );
  }

  return problems;
}

function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 1).trimEnd()}…`;
}

// =============================================================================
// TEMPLATE WRITER
// =============================================================================

const BASE_HASHTAGS = ['#TikTokShop', '#TikTokMadeMeBuyIt', '#musthave', '#deals', '#shopping'];

export class TemplateCaptionWriter implements CaptionWriter {
  constructor(private readonly rules: CaptionRules = DEFAULT_CAPTION_RULES) {}

  async write(item: CatalogItem): Promise<Caption> {
    const lines = [`${this.rules.disclosure} ${item.name}`];
    if (item.price !== null) {
      lines.push(`Price: ${item.price.toLocaleString('en-US')}`);
    }
    if (item.description) {
      lines.push(item.description);
    }
    lines.push('Check it out on TikTok Shop!');

    const hashtags = [...BASE_HASHTAGS];
    const categoryTag = item.category?.replace(/[^\p{L}\p{N}_]/gu, '');
    if (categoryTag && !hashtags.includes(`#${categoryTag}`)) {
      hashtags.unshift(`#${categoryTag}`);
    }

    return formatCaption(
      truncate(lines.join('\n'), this.rules.maxBodyLength),
      hashtags.slice(0, this.rules.maxHashtags)
    );
  }
}

// =============================================================================
// CLAUDE WRITER
// =============================================================================

export type CompleteFn = (prompt: string, signal?: AbortSignal) => Promise<string>;

export interface ClaudeCaptionConfig {
  apiKey?: string;
  model: string;
  maxTokens: number;
  /** Extra generations after the first one fails validation */
  maxRetries: number;
  rules: CaptionRules;
}

const DEFAULT_CLAUDE_CAPTION_CONFIG: ClaudeCaptionConfig = {
  model: 'claude-3-5-sonnet-20241022',
  maxTokens: 600,
  maxRetries: 2,
  rules: DEFAULT_CAPTION_RULES,
};

/**
 * Completion function backed by the Anthropic Messages API
 */
export function anthropicCompletion(client: Anthropic, model: string, maxTokens: number): CompleteFn {
  return async (prompt, signal) => {
    const response = await client.messages.create(
      {
        model,
        max_tokens: maxTokens,
        messages: [{ role: 'user', content: prompt }],
      },
      { signal }
    );

    const textContent = response.content.find((c) => c.type === 'text');
    if (textContent && textContent.type === 'text') {
      return textContent.text.trim();
    }

    throw new Error('No text content in response');
  };
}

export function buildCaptionPrompt(item: CatalogItem, rules: CaptionRules): string {
  return `You are a popular TikTok creator introducing products.
Write the caption for a TikTok photo post about this product.

Product:
Name: ${item.name}
Price: ${item.price ?? 'unknown'}
Category: ${item.category ?? 'unknown'}
Description: ${item.description ?? 'no description available'}

Rules:
- Start the body with "${rules.disclosure}" (advertising disclosure)
- At most ${rules.maxBodyLength} characters in the body
- 3 to 5 emoji
- Describe concrete moments where the product helps
- Friendly, speaking directly to the viewer
- End with a line inviting viewers to check it out on TikTok Shop
- Between ${rules.minHashtags} and ${rules.maxHashtags} hashtags

Output format:
Body:
(the caption, starting with "${rules.disclosure}")

Hashtags:
#tag1 #tag2 #tag3 #tag4 #tag5

Answer in exactly this format.`;
}

export class ClaudeCaptionWriter implements CaptionWriter {
  private readonly config: ClaudeCaptionConfig;
  private readonly fallback: CaptionWriter;
  private complete: CompleteFn | null;

  constructor(
    config: Partial<ClaudeCaptionConfig> = {},
    options: { complete?: CompleteFn; fallback?: CaptionWriter } = {}
  ) {
    this.config = { ...DEFAULT_CLAUDE_CAPTION_CONFIG, ...config };
    this.complete = options.complete ?? null;
    this.fallback = options.fallback ?? new TemplateCaptionWriter(this.config.rules);
  }

  /**
   * Create the Anthropic-backed completion lazily (only when a caption is written)
   */
  private getComplete(): CompleteFn | null {
    if (!this.complete && this.config.apiKey) {
      const client = new Anthropic({ apiKey: this.config.apiKey });
      this.complete = anthropicCompletion(client, this.config.model, this.config.maxTokens);
    }
    return this.complete;
  }

  async write(item: CatalogItem, signal?: AbortSignal): Promise<Caption> {
    const complete = this.getComplete();
    if (!complete) {
      return this.fallback.write(item);
    }

    const prompt = buildCaptionPrompt(item, this.config.rules);
    const attempts = this.config.maxRetries + 1;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const caption = parseCaption(await complete(prompt, signal), this.config.rules.maxHashtags);
        const problems = validateCaption(caption, this.config.rules);
        if (problems.length === 0) {
          return caption;
        }
        console.warn(`[Captions] Attempt ${attempt}/${attempts} rejected: ${problems.join('; ')}`);
      } catch (error) {
        // An aborted run gets no template caption either
        if (signal?.aborted) throw error;
        console.error(`[Captions] Attempt ${attempt}/${attempts} failed: ${errorMessage(error)}`);
      }
    }

    console.warn(`[Captions] Using template caption for ${item.itemId}`);
    return this.fallback.write(item);
  }
}
