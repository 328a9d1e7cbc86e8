/**
 * Composition root
 *
 * Wires the store, credentials, remote collaborators, pipeline and run
 * coordinator from one validated AppConfig. No module-level state.
 */

import type { AppConfig } from './modules/config/index.js';
import { createDatabase, checkDatabaseHealth, closeDatabaseConnection, type DatabaseHandle } from './modules/database/index.js';
import { DrizzleCatalogStore } from './modules/catalog/index.js';
import {
  CredentialManager,
  DrizzleCredentialRepository,
  TikTokTokenClient,
} from './modules/credentials/index.js';
import {
  ClaudeCaptionWriter,
  DEFAULT_CAPTION_RULES,
  ImgbbMediaHost,
  PublishPipeline,
  TikTokContentApi,
} from './modules/publisher/index.js';
import { FileRunLock, FileRunLog, RunCoordinator } from './modules/runner/index.js';

export interface Container {
  database: DatabaseHandle;
  store: DrizzleCatalogStore;
  credentials: CredentialManager;
  tokenClient: TikTokTokenClient;
  pipeline: PublishPipeline;
  coordinator: RunCoordinator;
  checkHealth(): Promise<boolean>;
  close(): Promise<void>;
}

export function createContainer(config: AppConfig): Container {
  const database = createDatabase(config.store);
  const store = new DrizzleCatalogStore(database.db);

  const tokenClient = new TikTokTokenClient(config.tiktok);
  const credentials = new CredentialManager(
    new DrizzleCredentialRepository(database.db),
    tokenClient,
    config.credentials
  );

  const pipeline = new PublishPipeline(
    {
      store,
      credentials,
      mediaHost: new ImgbbMediaHost(config.hosting),
      publisher: new TikTokContentApi({ apiBaseUrl: config.tiktok.apiBaseUrl }),
      captions: new ClaudeCaptionWriter({
        apiKey: config.content.anthropicApiKey,
        model: config.content.model,
        rules: { ...DEFAULT_CAPTION_RULES, disclosure: config.content.disclosure },
      }),
    },
    config.pipeline
  );

  const coordinator = new RunCoordinator(
    {
      store,
      credentials,
      pipeline,
      lock: new FileRunLock({ path: config.run.lockPath, staleAfterMs: config.run.lockStaleAfterMs }),
      runLog: new FileRunLog(config.run.runLogPath),
    },
    { timeoutMs: config.run.timeoutMs }
  );

  return {
    database,
    store,
    credentials,
    tokenClient,
    pipeline,
    coordinator,
    checkHealth: () => checkDatabaseHealth(database.pool),
    close: () => closeDatabaseConnection(database.pool),
  };
}
