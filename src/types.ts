/**
 * Page Forge Type Definitions
 *
 * Types shared across the page pipeline.
 * No runtime values - pure type definitions.
 */

import type { Logger } from 'pino';
import type { AuthorIdentity } from './author.js';

// =============================================================================
// METADATA
// =============================================================================

/**
 * Header mapping as parsed from the YAML block, before normalization.
 */
export type RawHeader = Record<string, unknown>;

/**
 * Normalized page metadata.
 * Every field is present and typed regardless of how complete the header was.
 */
export interface PageMetadata {
  /** Never empty */
  readonly title: string;
  /** Derived slugs match [a-z0-9-]*, explicit ones are kept verbatim */
  readonly slug: string;
  /** Possibly empty */
  readonly author: AuthorIdentity;
  readonly category: readonly string[];
  readonly published: boolean;
  readonly datetime: Date;
  readonly tags: readonly string[];
  /** Relative to the web root, e.g. /guides/setup/install.html */
  readonly url: string;
  /** Header keys that are not guaranteed fields (type, time, date, custom keys) */
  readonly extra: Readonly<RawHeader>;
}

/** Keys of PageMetadata that normalization guarantees */
export type MetadataField = Exclude<keyof PageMetadata, 'extra'>;

export interface NormalizeOptions {
  /** Clock used when the header carries no datetime */
  now?: () => Date;
  /** Diagnostics sink; silent when omitted */
  logger?: Logger;
}

// =============================================================================
// SOURCE
// =============================================================================

export interface SplitSource {
  /** Text before the delimiter line, null when the file has no header */
  header: string | null;
  body: string;
}

// =============================================================================
// COLLABORATORS
// =============================================================================

/**
 * Converts raw body text to HTML.
 */
export interface TextRenderer {
  /** Registry name, e.g. "markdown" */
  readonly name: string;
  /** File extensions without the dot */
  readonly extensions: readonly string[];
  render(text: string): string;
}

export type TemplateVariables = Readonly<Record<string, unknown>>;

/**
 * Resolves a named template and renders it with a variable mapping.
 */
export interface TemplateEngine {
  readonly templateDir: string;
  render(name: string, variables: TemplateVariables): string;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface SiteOptions {
  /** Where <type>.html templates are looked up */
  readonly templateDir: string;
  /** Root the page URLs are written under */
  readonly outputDir: string;
  /** Renderer forced for every page, null to choose by file extension */
  readonly renderer: string | null;
}

/**
 * Immutable per-run bundle shared by every page.
 */
export interface BuildContext {
  readonly options: SiteOptions;
  /** Built once per run */
  readonly templates: TemplateEngine;
  readonly logger: Logger;
  /** Set when options.renderer names one */
  readonly renderer: TextRenderer | null;
  readonly now: () => Date;
}

// =============================================================================
// ERRORS
// =============================================================================

export type PageErrorDetail =
  | { code: 'SOURCE_READ_ERROR'; path: string; reason: string }
  | { code: 'METADATA_PARSE_ERROR'; filename: string; reason: string; field?: string }
  | { code: 'RENDER_ERROR'; filename: string; renderer: string; reason: string }
  | { code: 'TEMPLATE_NOT_FOUND'; template: string; templateDir: string }
  | { code: 'TEMPLATE_RENDER_ERROR'; template: string; reason: string }
  | { code: 'WRITE_ERROR'; path: string; reason: string }
  | { code: 'CONFIG_INVALID'; source: string; reason: string };

export type PageErrorCode = PageErrorDetail['code'];

// =============================================================================
// BUILD RESULTS
// =============================================================================

export interface PageBuildSuccess {
  success: true;
  /** Source file */
  path: string;
  slug: string;
  url: string;
  /** Null on a dry run */
  destination: string | null;
  /** UTF-8 size of the rendered page */
  bytes: number;
}

export interface PageBuildFailure {
  success: false;
  path: string;
  error: PageErrorDetail;
}

export type PageBuildResult = PageBuildSuccess | PageBuildFailure;

export interface BuildPageOptions {
  /** Overrides the context renderer and extension lookup */
  renderer?: TextRenderer;
  templateVars?: TemplateVariables;
  /** false renders without writing */
  write?: boolean;
}
