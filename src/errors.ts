/**
 * Page Errors
 *
 * Every failure the pipeline reports is a PageError carrying a coded detail.
 * Errors are local to one page.
 */

import type { PageErrorCode, PageErrorDetail } from './types.js';

export class PageError extends Error {
  readonly detail: PageErrorDetail;

  constructor(detail: PageErrorDetail, options?: { cause?: unknown }) {
    super(formatError(detail), options);
    this.name = 'PageError';
    this.detail = detail;
  }

  get code(): PageErrorCode {
    return this.detail.code;
  }
}

/**
 * Render an error detail as a single human-readable line.
 */
export function formatError(detail: PageErrorDetail): string {
  switch (detail.code) {
    case 'SOURCE_READ_ERROR':
      return `Cannot read ${detail.path}: ${detail.reason}`;
    case 'METADATA_PARSE_ERROR':
      return detail.field
        ? `Invalid "${detail.field}" in ${detail.filename}: ${detail.reason}`
        : `Invalid header in ${detail.filename}: ${detail.reason}`;
    case 'RENDER_ERROR':
      return `Renderer ${detail.renderer} failed on ${detail.filename}: ${detail.reason}`;
    case 'TEMPLATE_NOT_FOUND':
      return `Template ${detail.template} not found in ${detail.templateDir}`;
    case 'TEMPLATE_RENDER_ERROR':
      return `Template ${detail.template} failed: ${detail.reason}`;
    case 'WRITE_ERROR':
      return `Cannot write ${detail.path}: ${detail.reason}`;
    case 'CONFIG_INVALID':
      return `Invalid configuration in ${detail.source}: ${detail.reason}`;
  }
}

/**
 * Message of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Node errno code (ENOENT, EEXIST, ...) of a thrown value, if it has one.
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
