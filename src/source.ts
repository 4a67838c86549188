/**
 * Source Files
 *
 * A source file is an optional YAML header, a line holding only `---`,
 * then the body. Only the first delimiter line splits; later ones belong
 * to the body.
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import type { SplitSource } from './types.js';
import { PageError, describeError } from './errors.js';

/** First line made of three hyphens, trailing blanks and CR tolerated */
const DELIMITER_LINE = /^---[ \t]*\r?$/m;

/**
 * Read a source file as UTF-8.
 */
export async function readSource(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw new PageError(
      { code: 'SOURCE_READ_ERROR', path, reason: describeError(error) },
      { cause: error }
    );
  }
}

/**
 * Split file text at the first delimiter line.
 *
 *   splitSource('title: Hi\n---\nHello')  // { header: 'title: Hi\n', body: 'Hello' }
 *   splitSource('Hello')                  // { header: null, body: 'Hello' }
 */
export function splitSource(text: string): SplitSource {
  const match = DELIMITER_LINE.exec(text);
  if (!match) {
    return { header: null, body: text };
  }

  let bodyStart = match.index + match[0].length;
  if (text[bodyStart] === '\n') {
    bodyStart += 1;
  }

  return {
    header: text.slice(0, match.index),
    body: text.slice(bodyStart),
  };
}

/**
 * Parse header text as YAML.
 *
 * Uses the core schema plus the timestamp tag: unquoted dates load as
 * Dates, while yes/no, On/Off and 10:30 stay strings. Returns null for an
 * empty header. The result is not checked for shape; normalization does
 * that.
 */
export function parseHeader(header: string | null, filename: string): unknown {
  if (header === null) {
    return null;
  }

  try {
    return parse(header, { schema: 'core', customTags: ['timestamp'] }) ?? null;
  } catch (error) {
    throw new PageError(
      { code: 'METADATA_PARSE_ERROR', filename, reason: describeError(error) },
      { cause: error }
    );
  }
}
