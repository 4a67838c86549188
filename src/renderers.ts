/**
 * Body Renderers
 *
 * Turn the text after the header into HTML. Plain is the fallback for
 * any file whose extension no renderer claims.
 */

import { extname } from 'node:path';
import { remark } from 'remark';
import remarkGfm from 'remark-gfm';
import remarkHtml from 'remark-html';
import type { TextRenderer } from './types.js';

/**
 * Site authors own their content, so raw HTML in Markdown is kept.
 */
const markdownProcessor = remark().use(remarkGfm).use(remarkHtml, { sanitize: false });

/**
 * Passes the text through unchanged.
 */
export const Plain: TextRenderer = {
  name: 'plain',
  extensions: ['txt', 'text', 'html'],
  render: (text) => text,
};

/**
 * GitHub Flavored Markdown.
 */
export const Markdown: TextRenderer = {
  name: 'markdown',
  extensions: ['md', 'markdown', 'mkd', 'mdown'],
  render: (text) => String(markdownProcessor.processSync(text)),
};

const RENDERERS: readonly TextRenderer[] = [Plain, Markdown];

/**
 * All registered renderers.
 */
export function getAvailableRenderers(): readonly TextRenderer[] {
  return RENDERERS;
}

/**
 * Look up a renderer by name.
 */
export function getRenderer(name: string): TextRenderer | undefined {
  const wanted = name.toLowerCase();
  return RENDERERS.find((renderer) => renderer.name === wanted);
}

/**
 * Renderer claiming the file's extension, or Plain.
 */
export function rendererForFile(filename: string): TextRenderer {
  const extension = extname(filename).slice(1).toLowerCase();
  if (extension === '') {
    return Plain;
  }
  return RENDERERS.find((renderer) => renderer.extensions.includes(extension)) ?? Plain;
}
