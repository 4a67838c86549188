/**
 * Page Forge - Public API
 *
 * Exports all public interfaces for programmatic use.
 */

// Pages
export { Page, ensureDirectory } from './page.js';
export { buildPage, buildPages, formatResult } from './builder.js';
export { createBuildContext } from './context.js';
export type { ContextOverrides } from './context.js';

// Types
export type {
  RawHeader,
  PageMetadata,
  MetadataField,
  NormalizeOptions,
  SplitSource,
  TextRenderer,
  TemplateVariables,
  TemplateEngine,
  SiteOptions,
  BuildContext,
  PageErrorDetail,
  PageErrorCode,
  PageBuildSuccess,
  PageBuildFailure,
  PageBuildResult,
  BuildPageOptions,
} from './types.js';

// Metadata
export { normalizeMetadata, toRawHeader, getField, titleFromFilename } from './metadata.js';
export { AuthorIdentity, parseAuthor, emptyAuthor } from './author.js';
export { slugify, isNormalizedSlug, SLUG_PATTERN } from './slugify.js';

// Source
export { readSource, splitSource, parseHeader } from './source.js';

// Renderers and templates
export { Plain, Markdown, getRenderer, getAvailableRenderers, rendererForFile } from './renderers.js';
export { createTemplateEngine } from './templates.js';

// Options
export { DEFAULT_OPTIONS, CONFIG_FILE, resolveOptions, applyOverrides, loadOptions } from './options.js';

// Errors and logging
export { PageError, formatError } from './errors.js';
export { createLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
