/**
 * Page
 *
 * One source file through the whole pipeline:
 * 1. Load and split the source
 * 2. Normalize the header
 * 3. Render the body
 * 4. Render the template (render)
 * 5. Write the HTML under the output directory (write)
 *
 * Steps 1-3 run in Page.load.
 */

import { mkdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import type {
  BuildContext,
  PageMetadata,
  SiteOptions,
  TemplateVariables,
  TextRenderer,
} from './types.js';
import type { AuthorIdentity } from './author.js';
import { PageError, describeError, errorCode } from './errors.js';
import { getField, normalizeMetadata } from './metadata.js';
import { parseHeader, readSource, splitSource } from './source.js';
import { Plain } from './renderers.js';

const DEFAULT_TEMPLATE = 'default';

export class Page {
  /** Child pages, filled in by whoever assembles the hierarchy */
  readonly subpages: Page[] = [];

  /** Final page, null until render() */
  html: string | null = null;

  private constructor(
    readonly path: string,
    readonly filename: string,
    /** Body text with the header removed */
    readonly original: string,
    readonly meta: PageMetadata,
    /** Rendered body */
    readonly content: string,
    readonly renderer: TextRenderer,
    private readonly context: BuildContext
  ) {}

  /**
   * Read, split, normalize and render the body of a source file.
   *
   * The renderer defaults to the one forced by the options, then Plain.
   */
  static async load(path: string, context: BuildContext, renderer?: TextRenderer): Promise<Page> {
    const chosen = renderer ?? context.renderer ?? Plain;
    const filename = basename(path);

    const text = await readSource(path);
    const { header, body } = splitSource(text);
    const meta = normalizeMetadata(parseHeader(header, filename), filename, {
      now: context.now,
      logger: context.logger,
    });

    context.logger.info(
      { slug: meta.slug, renderer: chosen.name },
      `Rendering ${meta.slug} with ${chosen.name}`
    );

    let content: string;
    try {
      content = chosen.render(body);
    } catch (error) {
      throw new PageError(
        { code: 'RENDER_ERROR', filename, renderer: chosen.name, reason: describeError(error) },
        { cause: error }
      );
    }

    return new Page(path, filename, body, meta, content, chosen, context);
  }

  get options(): SiteOptions {
    return this.context.options;
  }

  get title(): string {
    return this.meta.title;
  }

  get slug(): string {
    return this.meta.slug;
  }

  get author(): AuthorIdentity {
    return this.meta.author;
  }

  get category(): readonly string[] {
    return this.meta.category;
  }

  get published(): boolean {
    return this.meta.published;
  }

  get datetime(): Date {
    return this.meta.datetime;
  }

  get tags(): readonly string[] {
    return this.meta.tags;
  }

  get url(): string {
    return this.meta.url;
  }

  /**
   * Any metadata field by name, including header keys the page doesn't
   * guarantee. Undefined when absent.
   */
  field(name: string): unknown {
    return getField(this.meta, name);
  }

  /**
   * Template name picked from the `type` header key.
   */
  get templateName(): string {
    const type = this.field('type');
    return `${typeof type === 'string' && type !== '' ? type : DEFAULT_TEMPLATE}.html`;
  }

  /**
   * Render the page through its template.
   *
   * Templates see the caller's variables plus `page`. The page always wins
   * over a caller variable of the same name.
   */
  render(templateVars: TemplateVariables = {}): string {
    this.html = this.context.templates.render(this.templateName, {
      ...templateVars,
      page: this,
    });
    return this.html;
  }

  /**
   * Write the rendered page to outputDir + url.
   * Returns the path written.
   */
  async write(): Promise<string> {
    const destination = join(this.options.outputDir, this.url);

    if (this.html === null) {
      throw writeError(destination, 'page has not been rendered');
    }
    if (!isInside(this.options.outputDir, destination)) {
      throw writeError(destination, `url ${this.url} leaves the output directory`);
    }

    try {
      await ensureDirectory(dirname(destination));
    } catch (error) {
      throw writeError(destination, describeError(error), error);
    }

    await writeAtomically(destination, this.html);
    return destination;
  }

  toString(): string {
    return `<Page '${this.slug}'>`;
  }
}

// =============================================================================
// FILE OUTPUT
// =============================================================================

/**
 * Create a directory and its parents unless it already exists.
 * Losing a creation race to another writer is fine; anything else throws.
 */
export async function ensureDirectory(dir: string): Promise<void> {
  if (await isDirectory(dir)) {
    return;
  }

  try {
    await mkdir(dir, { recursive: true });
  } catch (error) {
    if (errorCode(error) === 'EEXIST' && (await isDirectory(dir))) {
      return;
    }
    throw error;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Write to a sibling temp file, then rename over the destination.
 * The destination either keeps its old content or gets all of the new.
 */
export async function writeAtomically(
  destination: string,
  html: string,
  temporary = `${destination}.${randomUUID()}.tmp`
): Promise<void> {
  try {
    await writeFile(temporary, html, 'utf-8');
    await rename(temporary, destination);
  } catch (error) {
    let reason = describeError(error);
    try {
      await rm(temporary, { force: true });
    } catch (cleanupError) {
      reason += `; could not remove ${temporary}: ${describeError(cleanupError)}`;
    }
    throw writeError(destination, reason, error);
  }
}

function isInside(root: string, path: string): boolean {
  const rel = relative(resolve(root), resolve(path));
  return rel !== '' && rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

function writeError(path: string, reason: string, cause?: unknown): PageError {
  return new PageError({ code: 'WRITE_ERROR', path, reason }, { cause });
}
