/**
 * Site Options
 *
 * Read from an optional YAML config file (snake_case keys, as in
 * `output_dir: public`), then overridden from the command line.
 * Validation is strict: unknown keys and wrong types are rejected.
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import type { SiteOptions } from './types.js';
import { PageError, describeError, errorCode } from './errors.js';
import { getAvailableRenderers, getRenderer } from './renderers.js';
import { isHeaderMapping } from './metadata.js';

export const CONFIG_FILE = 'config.yaml';

export const DEFAULT_OPTIONS: SiteOptions = Object.freeze({
  templateDir: 'templates',
  outputDir: '.',
  renderer: null,
});

const CONFIG_KEYS = {
  template_dir: 'templateDir',
  output_dir: 'outputDir',
  renderer: 'renderer',
} as const;

type ConfigKey = keyof typeof CONFIG_KEYS;

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/**
 * Validate a raw config mapping into SiteOptions.
 * `source` names where the mapping came from, for error messages.
 */
export function resolveOptions(raw: unknown, source = '<options>'): SiteOptions {
  if (raw === null || raw === undefined) {
    return DEFAULT_OPTIONS;
  }
  if (!isHeaderMapping(raw)) {
    throw configError(source, 'configuration must be a mapping');
  }

  const resolved: Mutable<SiteOptions> = { ...DEFAULT_OPTIONS };

  for (const [key, value] of Object.entries(raw)) {
    if (!isConfigKey(key)) {
      throw configError(source, `unknown key "${key}"`);
    }
    if (value === null) {
      continue;
    }
    if (typeof value !== 'string' || value === '') {
      throw configError(source, `"${key}" must be a non-empty string`);
    }

    const field = CONFIG_KEYS[key];
    if (field === 'renderer') {
      resolved.renderer = checkRenderer(value, source);
    } else {
      resolved[field] = value;
    }
  }

  return Object.freeze(resolved);
}

/**
 * Apply command-line values on top of file options.
 */
export function applyOverrides(
  options: SiteOptions,
  overrides: Partial<SiteOptions>,
  source = '<command line>'
): SiteOptions {
  const renderer = overrides.renderer ?? options.renderer;
  return Object.freeze({
    templateDir: overrides.templateDir ?? options.templateDir,
    outputDir: overrides.outputDir ?? options.outputDir,
    renderer: renderer === null ? null : checkRenderer(renderer, source),
  });
}

/**
 * Load options from a YAML file.
 * Returns defaults if the file doesn't exist.
 */
export async function loadOptions(path: string = CONFIG_FILE): Promise<SiteOptions> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return DEFAULT_OPTIONS;
    }
    throw configError(path, describeError(error));
  }

  let raw: unknown;
  try {
    raw = parse(content);
  } catch (error) {
    throw configError(path, describeError(error));
  }

  return resolveOptions(raw, path);
}

function checkRenderer(name: string, source: string): string {
  const renderer = getRenderer(name);
  if (!renderer) {
    const available = getAvailableRenderers()
      .map((r) => r.name)
      .join(', ');
    throw configError(source, `unknown renderer "${name}" (available: ${available})`);
  }
  return renderer.name;
}

function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(CONFIG_KEYS, key);
}

function configError(source: string, reason: string): PageError {
  return new PageError({ code: 'CONFIG_INVALID', source, reason });
}
