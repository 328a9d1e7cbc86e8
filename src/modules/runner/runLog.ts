/**
 * Plain-text, append-only run log: one line per run.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { RunResult } from './types.js';

export interface RunLog {
  append(result: RunResult): Promise<void>;
}

/**
 * Tab-separated line for one run result
 */
export function formatRunLogLine(result: RunResult): string {
  const fields = [
    result.completedAt.toISOString(),
    `run=${result.runId}`,
    `item=${result.itemId ?? '-'}`,
    `status=${result.status}`,
    `reason=${result.reason ?? '-'}`,
    `publishId=${result.attempt?.publishId ?? '-'}`,
  ];
  return fields.join('\t');
}

export class FileRunLog implements RunLog {
  constructor(private readonly path: string) {}

  async append(result: RunResult): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, `${formatRunLogLine(result)}\n`, 'utf8');
  }
}
