/**
 * Metadata Normalization
 *
 * Turns whatever the header provided into a PageMetadata with every field
 * present and typed. Pure apart from the clock and diagnostics, both of
 * which are injectable. The raw header is never mutated.
 *
 * Guarantees:
 * - title: non-empty string, falls back to the file name
 * - slug: string, derived from the title when missing
 * - author: AuthorIdentity, possibly empty
 * - category: string list, [] when missing or null
 * - published: boolean, true unless the header says otherwise
 * - datetime: Date, `time` and `date` override `datetime`, then now()
 * - tags: string list, [] when missing or null
 * - url: /category/.../slug.html unless given
 */

import { posix } from 'node:path';
import type { Logger } from 'pino';
import type { MetadataField, NormalizeOptions, PageMetadata, RawHeader } from './types.js';
import { AuthorIdentity, emptyAuthor, parseAuthor } from './author.js';
import { PageError } from './errors.js';
import { isNormalizedSlug, slugify } from './slugify.js';
import { createSilentLogger } from './logger.js';

const GUARANTEED_FIELDS: readonly MetadataField[] = [
  'title',
  'slug',
  'author',
  'category',
  'published',
  'datetime',
  'tags',
  'url',
];

/** Checked in order; a later key overrides an earlier one */
const DATETIME_KEYS = ['datetime', 'time', 'date'] as const;

const TIME_OF_DAY = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/** Word spellings accepted for `published` */
const BOOLEAN_WORDS: ReadonlyMap<string, boolean> = new Map([
  ['true', true],
  ['yes', true],
  ['on', true],
  ['false', false],
  ['no', false],
  ['off', false],
]);

/**
 * Normalize a parsed header for the file `filename`.
 *
 * A null or undefined header counts as empty. Anything else that is not a
 * mapping is a METADATA_PARSE_ERROR.
 */
export function normalizeMetadata(
  rawHeader: unknown,
  filename: string,
  options: NormalizeOptions = {}
): PageMetadata {
  const header = toHeader(rawHeader, filename);
  const logger = options.logger ?? createSilentLogger();
  const now = options.now ?? (() => new Date());

  const title = normalizeTitle(header, filename, logger);
  const slug = normalizeSlug(header, title, filename, logger);
  const category = normalizeList(header, 'category', '/', filename);
  const tags = normalizeList(header, 'tags', ',', filename);
  logger.debug({ slug, tags }, 'Tags resolved');

  const metadata: PageMetadata = {
    title,
    slug,
    author: normalizeAuthor(header.author),
    category,
    published: normalizePublished(header.published, filename),
    datetime: normalizeDatetime(header, filename, now),
    tags,
    url: normalizeUrl(header.url, category, slug, filename),
    extra: Object.freeze(collectExtra(header)),
  };

  return Object.freeze(metadata);
}

/**
 * Raw header equivalent of normalized metadata.
 * Normalizing the result again yields an equal record.
 */
export function toRawHeader(metadata: PageMetadata): RawHeader {
  return {
    ...metadata.extra,
    title: metadata.title,
    slug: metadata.slug,
    author: metadata.author.raw,
    category: [...metadata.category],
    published: metadata.published,
    datetime: metadata.datetime,
    tags: [...metadata.tags],
    url: metadata.url,
  };
}

/**
 * Look up a guaranteed field or an extra header key.
 * Returns undefined when the page has no such field.
 */
export function getField(metadata: PageMetadata, name: string): unknown {
  if (isGuaranteedField(name)) {
    return metadata[name];
  }
  return Object.prototype.hasOwnProperty.call(metadata.extra, name)
    ? metadata.extra[name]
    : undefined;
}

export function isGuaranteedField(name: string): name is MetadataField {
  return GUARANTEED_FIELDS.some((field) => field === name);
}

/**
 * Narrow a parsed header to a mapping.
 */
export function isHeaderMapping(value: unknown): value is RawHeader {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof Map) &&
    !(value instanceof Set)
  );
}

// =============================================================================
// FIELDS
// =============================================================================

function toHeader(rawHeader: unknown, filename: string): RawHeader {
  if (rawHeader === null || rawHeader === undefined) {
    return {};
  }
  if (!isHeaderMapping(rawHeader)) {
    throw new PageError({
      code: 'METADATA_PARSE_ERROR',
      filename,
      reason: `header must be a mapping of keys to values, got ${describeKind(rawHeader)}`,
    });
  }
  return rawHeader;
}

function normalizeTitle(header: RawHeader, filename: string, logger: Logger): string {
  const raw = header.title;

  if (typeof raw === 'string' && raw.trim() !== '') {
    return raw;
  }
  if (raw !== undefined && raw !== null && typeof raw !== 'string') {
    const text = scalarText(raw);
    if (text === undefined) {
      throw fieldError(filename, 'title', `expected a string, got ${describeKind(raw)}`);
    }
    return text;
  }

  const title = titleFromFilename(filename);
  logger.warn({ filename }, `No title given in ${filename}, using the file name as the title`);
  return title;
}

/**
 * File name without its last extension, or the whole name when that is empty.
 *
 *   titleFromFilename('post.md')     // 'post'
 *   titleFromFilename('a.b.md')      // 'a.b'
 *   titleFromFilename('.gitignore')  // '.gitignore'
 *   titleFromFilename('README')      // 'README'
 */
export function titleFromFilename(filename: string): string {
  const dot = filename.lastIndexOf('.');
  const base = dot === -1 ? '' : filename.slice(0, dot);
  return base === '' ? filename : base;
}

function normalizeSlug(
  header: RawHeader,
  title: string,
  filename: string,
  logger: Logger
): string {
  const raw = header.slug;

  if (raw === undefined || raw === null) {
    logger.debug({ filename }, 'No slug given, generating it from the title');
    return slugify(title);
  }
  if (typeof raw !== 'string' && typeof raw !== 'number') {
    throw fieldError(filename, 'slug', `expected a string, got ${describeKind(raw)}`);
  }

  const slug = String(raw);
  if (!isNormalizedSlug(slug)) {
    logger.warn(
      { filename, slug },
      'Slugs should be lower case and match the pattern [a-z0-9-]*'
    );
  }
  return slug;
}

function normalizeAuthor(raw: unknown): AuthorIdentity {
  return typeof raw === 'string' ? parseAuthor(raw) : emptyAuthor();
}

/**
 * Split a delimited string, or accept an already split list.
 * Pieces are trimmed and empty pieces dropped. Null means empty.
 */
function normalizeList(
  header: RawHeader,
  field: 'category' | 'tags',
  separator: string,
  filename: string
): readonly string[] {
  const raw = header[field];
  let pieces: string[];

  if (raw === undefined || raw === null) {
    pieces = [];
  } else if (typeof raw === 'string') {
    pieces = raw.split(separator);
  } else if (Array.isArray(raw)) {
    pieces = raw.map((item) => {
      const text = scalarText(item);
      if (text === undefined) {
        throw fieldError(filename, field, `expected a list of strings, got ${describeKind(item)} in it`);
      }
      return text;
    });
  } else {
    const text = scalarText(raw);
    if (text === undefined) {
      throw fieldError(filename, field, `expected a string or a list, got ${describeKind(raw)}`);
    }
    pieces = [text];
  }

  return Object.freeze(pieces.map((piece) => piece.trim()).filter((piece) => piece !== ''));
}

function normalizePublished(raw: unknown, filename: string): boolean {
  if (raw === undefined || raw === null) {
    return true;
  }
  if (typeof raw === 'boolean') {
    return raw;
  }
  const flag = typeof raw === 'string' ? BOOLEAN_WORDS.get(raw.trim().toLowerCase()) : undefined;
  if (flag === undefined) {
    throw fieldError(filename, 'published', `expected true or false, got ${describeKind(raw)}`);
  }
  return flag;
}

function normalizeDatetime(header: RawHeader, filename: string, now: () => Date): Date {
  let datetime: Date | undefined;

  for (const key of DATETIME_KEYS) {
    const raw = header[key];
    if (raw !== undefined && raw !== null) {
      datetime = toDate(raw, key, filename, now);
    }
  }

  return datetime ?? now();
}

function toDate(raw: unknown, field: string, filename: string, now: () => Date): Date {
  if (raw instanceof Date) {
    if (Number.isNaN(raw.getTime())) {
      throw fieldError(filename, field, 'invalid date');
    }
    return raw;
  }
  if (typeof raw === 'string') {
    const parsed = timeOfDay(raw, now) ?? new Date(raw);
    if (Number.isNaN(parsed.getTime())) {
      throw fieldError(filename, field, `cannot parse "${raw}" as a date`);
    }
    return parsed;
  }
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    const parsed = new Date(raw);
    if (Number.isNaN(parsed.getTime())) {
      throw fieldError(filename, field, `${raw} is out of range for a date`);
    }
    return parsed;
  }
  throw fieldError(filename, field, `expected a date, got ${describeKind(raw)}`);
}

/**
 * A bare "HH:MM" or "HH:MM:SS" is that time of day, in UTC, on the
 * clock's current date.
 */
function timeOfDay(text: string, now: () => Date): Date | undefined {
  const match = TIME_OF_DAY.exec(text.trim());
  if (!match) {
    return undefined;
  }

  const [hours, minutes, seconds] = [match[1], match[2], match[3] ?? '0'].map(Number);
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return undefined;
  }

  const day = now();
  return new Date(
    Date.UTC(day.getUTCFullYear(), day.getUTCMonth(), day.getUTCDate(), hours, minutes, seconds)
  );
}

function normalizeUrl(
  raw: unknown,
  category: readonly string[],
  slug: string,
  filename: string
): string {
  if (raw === undefined || raw === null) {
    return posix.join('/', ...category, `${slug}.html`);
  }
  if (typeof raw !== 'string') {
    throw fieldError(filename, 'url', `expected a string, got ${describeKind(raw)}`);
  }
  return raw;
}

function collectExtra(header: RawHeader): RawHeader {
  const extra: RawHeader = {};
  for (const [key, value] of Object.entries(header)) {
    if (!isGuaranteedField(key)) {
      extra[key] = value;
    }
  }
  return extra;
}

// =============================================================================
// HELPERS
// =============================================================================

function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/** Text of a scalar or a valid date (as YYYY-MM-DD); undefined for anything else */
function scalarText(value: unknown): string | undefined {
  if (isScalar(value)) {
    return String(value);
  }
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value.toISOString().slice(0, 10);
  }
  return undefined;
}

function describeKind(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'a list';
  if (value instanceof Date) return 'a date';
  const kind = typeof value;
  return kind === 'object' || kind === 'undefined' ? `an ${kind}` : `a ${kind}`;
}

function fieldError(filename: string, field: string, reason: string): PageError {
  return new PageError({ code: 'METADATA_PARSE_ERROR', filename, field, reason });
}
