/**
 * Build Context
 *
 * Everything pages share during one run. Created once, never mutated,
 * safe to hand to any number of concurrently processed pages.
 */

import type { Logger } from 'pino';
import type { BuildContext, SiteOptions, TemplateEngine } from './types.js';
import { createTemplateEngine } from './templates.js';
import { createLogger } from './logger.js';
import { getRenderer } from './renderers.js';
import { DEFAULT_OPTIONS } from './options.js';

export interface ContextOverrides {
  templates?: TemplateEngine;
  logger?: Logger;
  now?: () => Date;
}

export function createBuildContext(
  options: SiteOptions = DEFAULT_OPTIONS,
  overrides: ContextOverrides = {}
): BuildContext {
  return Object.freeze({
    options,
    templates: overrides.templates ?? createTemplateEngine(options.templateDir),
    logger: overrides.logger ?? createLogger(),
    renderer: options.renderer === null ? null : getRenderer(options.renderer) ?? null,
    now: overrides.now ?? (() => new Date()),
  });
}
