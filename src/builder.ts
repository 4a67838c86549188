/**
 * Page Builder
 *
 * Runs the pipeline for source files and reports each outcome as a result
 * object. A page that fails yields a failure result; it never stops the
 * other pages. Only errors that are not PageErrors propagate.
 */

import { basename } from 'node:path';
import type {
  BuildContext,
  BuildPageOptions,
  PageBuildResult,
} from './types.js';
import { PageError, formatError } from './errors.js';
import { Page } from './page.js';
import { rendererForFile } from './renderers.js';

const encoder = new TextEncoder();

/**
 * Load, render and write one page.
 *
 * Renderer precedence: options.renderer, then the context's forced
 * renderer, then the one claiming the file's extension.
 */
export async function buildPage(
  path: string,
  context: BuildContext,
  options: BuildPageOptions = {}
): Promise<PageBuildResult> {
  const renderer = options.renderer ?? context.renderer ?? rendererForFile(basename(path));

  try {
    const page = await Page.load(path, context, renderer);
    const html = page.render(options.templateVars);
    const destination = options.write === false ? null : await page.write();

    return {
      success: true,
      path,
      slug: page.slug,
      url: page.url,
      destination,
      bytes: encoder.encode(html).length,
    };
  } catch (error) {
    if (error instanceof PageError) {
      context.logger.debug({ path, code: error.code }, 'Page failed');
      return { success: false, path, error: error.detail };
    }
    throw error;
  }
}

/**
 * Build several pages concurrently. Results keep the order of `paths`.
 */
export function buildPages(
  paths: readonly string[],
  context: BuildContext,
  options: BuildPageOptions = {}
): Promise<PageBuildResult[]> {
  return Promise.all(paths.map((path) => buildPage(path, context, options)));
}

/**
 * Format a build result for display.
 */
export function formatResult(result: PageBuildResult): string {
  if (!result.success) {
    return `Failed: ${result.path}: ${result.error.code}: ${formatError(result.error)}`;
  }
  if (result.destination === null) {
    return `Rendered: ${result.path} -> ${result.url} (${result.bytes} bytes)`;
  }
  return `Wrote: ${result.destination} (${result.bytes} bytes)`;
}
