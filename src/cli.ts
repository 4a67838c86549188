#!/usr/bin/env node

/**
 * CLI Interface
 *
 * Command-line driver for the page pipeline.
 * Runs the pipeline once per file named on the command line.
 */

import { parseArgs } from 'node:util';
import { basename } from 'node:path';
import type { SiteOptions } from './types.js';
import { buildPages, formatResult } from './builder.js';
import { createBuildContext } from './context.js';
import { PageError } from './errors.js';
import { createLogger } from './logger.js';
import { applyOverrides, loadOptions, CONFIG_FILE } from './options.js';
import { normalizeMetadata } from './metadata.js';
import { getAvailableRenderers } from './renderers.js';
import { parseHeader, readSource, splitSource } from './source.js';

/**
 * CLI commands.
 */
type Command = 'build' | 'meta' | 'renderers' | 'help';

const COMMANDS: readonly Command[] = ['build', 'meta', 'renderers', 'help'];

interface CliOptions {
  config?: string;
  output?: string;
  templates?: string;
  renderer?: string;
  verbose?: boolean;
  help?: boolean;
}

/**
 * Parse command line arguments.
 */
function parseCliArgs(): { command: string; args: string[]; options: CliOptions } {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      config: { type: 'string', short: 'c' },
      output: { type: 'string', short: 'o' },
      templates: { type: 'string', short: 't' },
      renderer: { type: 'string', short: 'r' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  return { command: positionals[0] ?? 'help', args: positionals.slice(1), options: values };
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

/**
 * Print help message.
 */
function printHelp(): void {
  console.log(`
Page Forge - Render content files into static HTML pages

USAGE:
  page-forge <command> [options]

COMMANDS:
  build <files...>        Render each file and write it under the output directory
  meta <file>             Print the normalized metadata of a file as JSON
  renderers               List available body renderers
  help                    Show this help message

OPTIONS:
  -c, --config <file>     YAML config file (default: ${CONFIG_FILE})
  -o, --output <dir>      Output directory (overrides output_dir)
  -t, --templates <dir>   Template directory (overrides template_dir)
  -r, --renderer <name>   Use one renderer for every file
  -v, --verbose           Log debug diagnostics
  -h, --help              Show help

EXAMPLES:
  page-forge build content/about.md content/blog/hello.md
  page-forge build notes.txt -o public -t layouts
  page-forge meta content/about.md
  page-forge renderers
`);
}

/**
 * Resolve options from the config file and command-line overrides.
 */
async function resolveCliOptions(options: CliOptions): Promise<SiteOptions> {
  const fromFile = await loadOptions(options.config ?? CONFIG_FILE);
  return applyOverrides(fromFile, {
    outputDir: options.output,
    templateDir: options.templates,
    renderer: options.renderer,
  });
}

/**
 * Build command.
 */
async function runBuild(paths: string[], options: CliOptions): Promise<number> {
  const siteOptions = await resolveCliOptions(options);
  const context = createBuildContext(siteOptions, {
    logger: createLogger({ verbose: options.verbose }),
  });

  const results = await buildPages(paths, context);

  let failed = 0;
  for (const result of results) {
    if (result.success) {
      console.log(formatResult(result));
    } else {
      failed += 1;
      console.error(formatResult(result));
    }
  }

  console.log('');
  console.log(`Pages: ${results.length - failed} written, ${failed} failed`);

  return failed === 0 ? 0 : 1;
}

/**
 * Meta command.
 */
async function runMeta(path: string, options: CliOptions): Promise<number> {
  const logger = createLogger({ verbose: options.verbose });
  const filename = basename(path);
  const { header } = splitSource(await readSource(path));
  const meta = normalizeMetadata(parseHeader(header, filename), filename, { logger });

  console.log(JSON.stringify(meta, null, 2));
  return 0;
}

/**
 * Renderers command.
 */
function runRenderers(): number {
  console.log('Available renderers:');
  for (const renderer of getAvailableRenderers()) {
    console.log(`  ${renderer.name} (${renderer.extensions.map((ext) => `.${ext}`).join(', ')})`);
  }
  return 0;
}

/**
 * Main entry point.
 */
async function main(): Promise<number> {
  const { command, args, options } = parseCliArgs();

  if (options.help || command === 'help') {
    printHelp();
    return 0;
  }

  if (!isCommand(command)) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  try {
    switch (command) {
      case 'build':
        if (args.length === 0) {
          console.error('Missing source files');
          printHelp();
          return 1;
        }
        return await runBuild(args, options);

      case 'meta': {
        const path = args[0];
        if (!path) {
          console.error('Missing source file');
          printHelp();
          return 1;
        }
        return await runMeta(path, options);
      }

      case 'renderers':
        return runRenderers();

      case 'help':
        printHelp();
        return 0;
    }
  } catch (error) {
    if (error instanceof PageError) {
      console.error(`${error.code}: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

// Run
main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
