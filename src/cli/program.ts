/**
 * Command-line surface
 *
 *   run [--dry-run] [--item <id>] [--json]   one run, exit code from the result
 *   init-store                               apply the schema DDL
 *   catalog import|list|deactivate           catalog maintenance
 *   credentials status                       token state, read-only
 *   auth url | auth exchange                 initial authorization
 *   research run | research latest           product suggestions from Claude
 *   serve                                    scheduler + status API
 *
 * Exit codes: 0 success or clean skip, 1 run failure, 2 configuration or
 * credential failure.
 */

import { randomBytes } from 'node:crypto';
import Anthropic from '@anthropic-ai/sdk';
import { Command } from 'commander';
import { createContainer } from '../app.js';
import { startServer } from '../server.js';
import { loadConfig, loadResearchConfig, loadStoreConfig } from '../modules/config/index.js';
import { ConfigurationError, CredentialError, ValidationError, errorMessage } from '../modules/errors/index.js';
import { createDatabase, closeDatabaseConnection, initStore } from '../modules/database/index.js';
import { DrizzleCatalogStore, importItemsFromFile, type CatalogItem, type CatalogStore } from '../modules/catalog/index.js';
import { DrizzleCredentialRepository } from '../modules/credentials/index.js';
import { exitCodeFor, type RunResult } from '../modules/runner/index.js';
import { rankItems } from '../modules/rotation/index.js';
import { anthropicCompletion } from '../modules/publisher/index.js';
import { DrizzleResearchRepository, ProductResearcher, formatReport } from '../modules/research/index.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_FATAL = 2;

type Env = Record<string, string | undefined>;

/**
 * Run a command body and turn its outcome into an exit code
 */
export async function runCommand(body: () => Promise<number>): Promise<number> {
  try {
    return await body();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      return EXIT_FATAL;
    }
    if (error instanceof CredentialError) {
      console.error(`Credential error: ${error.message}`);
      return EXIT_FATAL;
    }
    if (error instanceof ValidationError) {
      console.error([error.message, ...error.issues].join('\n  '));
      return EXIT_FAILURE;
    }
    console.error(`Error: ${errorMessage(error)}`);
    return EXIT_FAILURE;
  }
}

/**
 * One-line human summary of a run
 */
export function summarizeRun(result: RunResult): string {
  const parts = [`status=${result.status}`];
  if (result.reason) parts.push(`reason=${result.reason}`);
  if (result.itemId) parts.push(`item=${result.itemId}`);
  if (result.attempt?.publishId) parts.push(`publishId=${result.attempt.publishId}`);
  if (result.reconciled) parts.push('reconciled');
  return parts.join(' ');
}

function formatItem(item: CatalogItem): string {
  const lastPosted = item.lastPostedAt ? item.lastPostedAt.toISOString() : 'never';
  return [item.itemId, item.active ? 'active' : 'inactive', `posts=${item.postCount}`, `last=${lastPosted}`, item.name].join('\t');
}

/**
 * Lines printed by `catalog list`; active-only listings come in rotation order
 */
export async function catalogListing(
  store: Pick<CatalogStore, 'listItems' | 'listActiveItems'>,
  activeOnly: boolean
): Promise<string[]> {
  const items = activeOnly ? rankItems(await store.listActiveItems()) : await store.listItems();
  return [...items.map(formatItem), `${items.length} item(s)`];
}

export function createProgram(env: Env = process.env): Command {
  const program = new Command();

  program
    .name('rotapost')
    .description('Publish the next catalog item on rotation and record the outcome')
    .version('0.1.0');

  // ── run ───────────────────────────────────
  program
    .command('run')
    .description('Select one item, publish it and record the outcome')
    .option('--dry-run', 'select and prepare only, no remote mutation or store writes', false)
    .option('--item <id>', 'target this item instead of the rotation choice')
    .option('--json', 'print the run result as JSON', false)
    .action(async (opts: { dryRun: boolean; item?: string; json: boolean }) => {
      process.exitCode = await runCommand(async () => {
        const container = createContainer(loadConfig(env));
        try {
          const result = await container.coordinator.runOnce({
            dryRun: opts.dryRun,
            forcedItemId: opts.item,
          });

          if (opts.json) {
            console.log(JSON.stringify(result, null, 2));
          } else {
            console.log(summarizeRun(result));
            if (result.preview) {
              console.log(`\n--- Caption preview (${result.preview.itemId}) ---\n${result.preview.text}`);
            }
          }
          return exitCodeFor(result);
        } finally {
          await container.close();
        }
      });
    });

  // ── init-store ────────────────────────────
  program
    .command('init-store')
    .description('Create the catalog, posting-log, credential and research tables if missing')
    .action(async () => {
      process.exitCode = await runCommand(async () => {
        const { pool } = createDatabase(loadStoreConfig(env));
        try {
          await initStore(pool);
          return EXIT_OK;
        } finally {
          await closeDatabaseConnection(pool);
        }
      });
    });

  // ── catalog ───────────────────────────────
  const catalog = program.command('catalog').description('Catalog maintenance');

  catalog
    .command('import <file>')
    .description('Upsert items from a JSON array or a CSV file with a header row; invalid entries are skipped and reported')
    .action(async (file: string) => {
      process.exitCode = await runCommand(async () => {
        const { db, pool } = createDatabase(loadStoreConfig(env));
        try {
          const result = await importItemsFromFile(new DrizzleCatalogStore(db), file);
          console.log(`Imported ${result.imported}, skipped ${result.skipped}`);
          for (const entry of result.errors) {
            console.log(`  #${entry.index}${entry.itemId ? ` (${entry.itemId})` : ''}: ${entry.issues.join('; ')}`);
          }
          return EXIT_OK;
        } finally {
          await closeDatabaseConnection(pool);
        }
      });
    });

  catalog
    .command('list')
    .description('List catalog items with their rotation stats')
    .option('--active', 'only active items, in rotation order', false)
    .action(async (opts: { active: boolean }) => {
      process.exitCode = await runCommand(async () => {
        const { db, pool } = createDatabase(loadStoreConfig(env));
        try {
          for (const line of await catalogListing(new DrizzleCatalogStore(db), opts.active)) {
            console.log(line);
          }
          return EXIT_OK;
        } finally {
          await closeDatabaseConnection(pool);
        }
      });
    });

  catalog
    .command('deactivate <itemId>')
    .description('Take an item out of rotation (items are never deleted)')
    .action(async (itemId: string) => {
      process.exitCode = await runCommand(async () => {
        const { db, pool } = createDatabase(loadStoreConfig(env));
        try {
          const found = await new DrizzleCatalogStore(db).deactivateItem(itemId);
          if (!found) {
            console.error(`Item ${itemId} does not exist`);
            return EXIT_FAILURE;
          }
          console.log(`Deactivated ${itemId}`);
          return EXIT_OK;
        } finally {
          await closeDatabaseConnection(pool);
        }
      });
    });

  // ── credentials ───────────────────────────
  program
    .command('credentials')
    .description('Credential inspection')
    .command('status')
    .description('Show the stored token state without refreshing it')
    .action(async () => {
      process.exitCode = await runCommand(async () => {
        const container = createContainer(loadConfig(env));
        try {
          const status = await container.credentials.inspect();
          console.log(`state=${status.state}`);
          console.log(`expiresAt=${status.expiresAt?.toISOString() ?? '-'}`);
          console.log(`accountId=${status.accountId ?? '-'}`);
          if (status.reason) console.log(`reason=${status.reason}`);
          return status.state === 'invalid' ? EXIT_FATAL : EXIT_OK;
        } finally {
          await container.close();
        }
      });
    });

  // ── auth ──────────────────────────────────
  const auth = program.command('auth').description('Initial authorization flow');

  auth
    .command('url')
    .description('Print the URL the account owner opens to grant access')
    .requiredOption('--redirect <uri>', 'registered redirect URI')
    .option('--state <state>', 'opaque state echoed back on redirect')
    .action(async (opts: { redirect: string; state?: string }) => {
      process.exitCode = await runCommand(async () => {
        const container = createContainer(loadConfig(env));
        try {
          const state = opts.state ?? randomBytes(16).toString('hex');
          console.log(container.tokenClient.authorizationUrl(opts.redirect, state));
          return EXIT_OK;
        } finally {
          await container.close();
        }
      });
    });

  auth
    .command('exchange <code>')
    .description('Exchange an authorization code and store the token pair')
    .requiredOption('--redirect <uri>', 'redirect URI used for the authorization')
    .action(async (code: string, opts: { redirect: string }) => {
      process.exitCode = await runCommand(async () => {
        const container = createContainer(loadConfig(env));
        try {
          const record = await container.tokenClient.exchangeCode(code, opts.redirect);
          await new DrizzleCredentialRepository(container.database.db).replace(record);
          console.log(`Stored credentials for ${record.accountId ?? 'unknown account'}, valid until ${record.expiresAt.toISOString()}`);
          return EXIT_OK;
        } finally {
          await container.close();
        }
      });
    });

  // ── research ──────────────────────────────
  const research = program.command('research').description('Product suggestions for the catalog');

  research
    .command('run')
    .description('Ask Claude for products likely to sell and log the suggestions')
    .action(async () => {
      process.exitCode = await runCommand(async () => {
        const config = loadResearchConfig(env);
        const { db, pool } = createDatabase(config.store);
        try {
          const researcher = new ProductResearcher({
            complete: anthropicCompletion(new Anthropic({ apiKey: config.anthropicApiKey }), config.model, config.maxTokens),
            repository: new DrizzleResearchRepository(db),
          });
          console.log(formatReport(await researcher.run()));
          return EXIT_OK;
        } finally {
          await closeDatabaseConnection(pool);
        }
      });
    });

  research
    .command('latest')
    .description('Show the most recent research suggestions')
    .action(async () => {
      process.exitCode = await runCommand(async () => {
        const { db, pool } = createDatabase(loadStoreConfig(env));
        try {
          const report = await new DrizzleResearchRepository(db).latest();
          if (!report) {
            console.log('No research has been run yet');
            return EXIT_OK;
          }
          console.log(formatReport(report));
          return EXIT_OK;
        } finally {
          await closeDatabaseConnection(pool);
        }
      });
    });

  // ── serve ─────────────────────────────────
  program
    .command('serve')
    .description('Run the scheduler and the status API until stopped')
    .action(async () => {
      const code = await runCommand(async () => {
        await startServer(loadConfig(env));
        return EXIT_OK;
      });
      if (code !== EXIT_OK) {
        process.exitCode = code;
      }
    });

  return program;
}
