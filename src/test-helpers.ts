/**
 * Shared test fixtures: temp directories, a fixed clock and a logger
 * that records what it was given.
 */

import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { Logger } from 'pino';
import type { BuildContext, SiteOptions, TemplateEngine } from './types.js';
import { createLogger } from './logger.js';
import { createBuildContext } from './context.js';
import { DEFAULT_OPTIONS } from './options.js';

export const FIXED_NOW = new Date('2024-05-01T12:00:00.000Z');

export const fixedClock = (): Date => FIXED_NOW;

export interface LogRecord {
  level: number;
  msg: string;
  fields: Record<string, unknown>;
}

/** pino numeric levels */
export const LEVEL = { debug: 20, info: 30, warn: 40 } as const;

/**
 * Debug-level logger whose lines are parsed into `records`.
 */
export function createRecordingLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = createLogger({
    verbose: true,
    destination: {
      write(line: string) {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
          const fields: Record<string, unknown> = Object.fromEntries(Object.entries(parsed));
          records.push({
            level: typeof fields.level === 'number' ? fields.level : 0,
            msg: typeof fields.msg === 'string' ? fields.msg : '',
            fields,
          });
        }
      },
    },
  });
  return { logger, records };
}

export function messagesAt(records: readonly LogRecord[], level: number): string[] {
  return records.filter((record) => record.level === level).map((record) => record.msg);
}

/**
 * Temporary directory with helpers for writing files into it.
 */
export async function createWorkspace(): Promise<{
  root: string;
  file: (relativePath: string, content: string) => Promise<string>;
  cleanup: () => Promise<void>;
}> {
  const root = await mkdtemp(join(tmpdir(), 'page-forge-'));
  return {
    root,
    async file(relativePath, content) {
      const path = join(root, relativePath);
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content, 'utf-8');
      return path;
    },
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

/**
 * Build context over the given options with a fixed clock and a recording
 * logger.
 */
export function createTestContext(
  options: Partial<SiteOptions> = {},
  templates?: TemplateEngine
): { context: BuildContext; records: LogRecord[] } {
  const { logger, records } = createRecordingLogger();
  const context = createBuildContext(
    { ...DEFAULT_OPTIONS, ...options },
    { logger, now: fixedClock, templates }
  );
  return { context, records };
}
