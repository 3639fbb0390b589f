/**
 * Loads the classifier rule table from JSON and hot-reloads it on change.
 * A reload that fails validation is logged and ignored, so the classifier
 * keeps its last good table.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { watch, type FSWatcher } from 'chokidar';
import { RuleTableSchema, type RuleTable } from './schema.js';
import { ValidationError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';

export const DEFAULT_RULES_PATH = fileURLToPath(
  new URL('../../config/rules.json', import.meta.url)
);

export function parseRuleTable(input: unknown): RuleTable {
  const result = RuleTableSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid rule table', {
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return result.data;
}

export class RuleTableSource {
  private watcher: FSWatcher | null = null;

  constructor(
    private readonly logger: ILogProvider,
    readonly path: string = DEFAULT_RULES_PATH
  ) {}

  async load(): Promise<RuleTable> {
    const raw = await readFile(this.path, 'utf-8');
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ValidationError(`Rule table at ${this.path} is not valid JSON`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    return parseRuleTable(json);
  }

  /** Start watching; `listener` receives every valid reloaded table. */
  watch(listener: (table: RuleTable) => void): void {
    if (this.watcher) return;

    this.watcher = watch(this.path, { ignoreInitial: true });
    this.watcher.on('change', () => {
      void this.reload(listener);
    });
    this.watcher.on('error', (error) => {
      this.logger.error('Rule table watcher failed', {
        path: this.path,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  async reload(listener: (table: RuleTable) => void): Promise<boolean> {
    try {
      const table = await this.load();
      listener(table);
      this.logger.info('Rule table reloaded', { path: this.path, version: table.version });
      return true;
    } catch (err) {
      this.logger.error('Rule table reload rejected, keeping previous table', {
        path: this.path,
        error: err instanceof Error ? err.message : String(err),
        ...(err instanceof ValidationError && err.details),
      });
      return false;
    }
  }

  async close(): Promise<void> {
    if (!this.watcher) return;
    await this.watcher.close();
    this.watcher = null;
  }
}
