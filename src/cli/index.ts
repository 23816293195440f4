#!/usr/bin/env node
/**
 * md-annotate CLI
 *
 * pandoc with annotation support, including:
 * - [comment]{.comment} / margin / fixme / highlight spans with draft, print and hide modes
 * - ::: comment / box / center blocks
 * - label, reference and index spans
 * - @[label](file) transclusion
 * - TikZ and Graphviz code blocks rendered to figures
 * - remote and local images mirrored and converted for the output format
 */

import { program } from 'commander';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join, resolve } from 'path';
import { type FilterConfig, loadConfig } from '../core/config';
import { FilterError } from '../core/errors';
import { buildPandocArgs, defaultOutputPath, runPandoc } from '../core/pandoc';
import { preprocess, type PreprocessorContext } from '../core/preprocessor';
import { ExternalTools, execFileRunner } from '../core/assets/tools';
import { isOutputFormat, OUTPUT_FORMATS } from '../core/types';

// Package version (will be set during build)
const VERSION = '1.0.0';

interface CliOptions {
  output?: string;
  to?: string;
  config?: string;
  assetDir?: string;
  fontFamily?: string;
  processImages: boolean;
  draft?: boolean;
  wordCount: boolean;
  markdownOnly?: boolean;
  pandoc?: string;
  pdflatex?: string;
  dot?: string;
  convert?: string;
  timeout?: string;
  verbose?: boolean;
}

/**
 * Apply CLI overrides on top of the loaded config
 */
function applyCliOptions(config: FilterConfig, options: CliOptions): FilterConfig {
  const result: FilterConfig = {
    ...config,
    annotations: { ...config.annotations },
    assets: { ...config.assets },
    tools: { ...config.tools },
  };

  if (options.to) {
    if (!isOutputFormat(options.to)) {
      throw new FilterError(
        'INVALID_FORMAT',
        `Unsupported output format: ${options.to} (expected one of ${OUTPUT_FORMATS.join(', ')})`,
      );
    }
    result.format = options.to;
  }
  if (options.assetDir) result.assets.dir = resolve(options.assetDir);
  if (options.fontFamily) result.assets.fontFamily = options.fontFamily;
  if (options.processImages === false) result.assets.processImages = false;
  if (options.draft) result.annotations.draft = true;
  if (options.wordCount === false) result.wordCount = false;
  if (options.pandoc) result.tools.pandoc = options.pandoc;
  if (options.pdflatex) result.tools.pdflatex = options.pdflatex;
  if (options.dot) result.tools.dot = options.dot;
  if (options.convert) result.tools.convert = options.convert;
  if (options.timeout) {
    const timeout = Number(options.timeout);
    if (!Number.isFinite(timeout) || timeout <= 0) {
      throw new FilterError('INVALID_CONFIG', `Invalid --timeout: ${options.timeout}`);
    }
    result.tools.timeout = timeout;
  }

  return result;
}

async function run(input: string, options: CliOptions, passThrough: string[]): Promise<void> {
  const verbose = options.verbose === true;

  // Load config (defaults -> file -> CLI overrides; front matter applies later)
  const config = applyCliOptions(loadConfig(options.config), options);

  if (verbose) {
    console.log('Config:', JSON.stringify(config, null, 2));
    console.log('Pass-through args:', passThrough);
  }

  // Resolve input path
  const inputPath = resolve(input);
  const inputDir = dirname(inputPath);

  // Read markdown file
  let markdown: string;
  try {
    markdown = await readFile(inputPath, 'utf-8');
  } catch (err) {
    throw new FilterError(
      'INPUT_UNREADABLE',
      `Error reading input file: ${input}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (verbose) {
    console.log(`Processing: ${inputPath}`);
  }

  const runner = execFileRunner({ timeout: config.tools.timeout });
  const context: PreprocessorContext = {
    config,
    tools: new ExternalTools({
      runner,
      pdflatexPath: config.tools.pdflatex,
      dotPath: config.tools.dot,
      convertPath: config.tools.convert,
      density: config.assets.density,
      quality: config.assets.quality,
    }),
    fileDir: inputDir,
  };

  const result = await preprocess(markdown, context);
  if (result.errors.length > 0) {
    console.warn(`${result.errors.length} asset(s) could not be processed; see the markers in the output.`);
  }

  const format = result.config.format;
  const outputPath = options.output ? resolve(options.output) : defaultOutputPath(inputPath, format);

  if (options.markdownOnly) {
    await writeFile(outputPath, result.markdown);
    console.log(`Written: ${outputPath}`);
    return;
  }

  // Write temp file
  const tmpDir = await mkdtemp(join(tmpdir(), 'md-annotate-'));
  const tmpMd = join(tmpDir, 'input.md');
  try {
    await writeFile(tmpMd, result.markdown);

    const args = buildPandocArgs(tmpMd, {
      format,
      outputPath,
      resourcePath: inputDir,
      additionalArgs: [...(config.pandocArgs ?? []), ...passThrough],
    });

    if (verbose) {
      console.log('Executing:', [config.tools.pandoc, ...args].join(' '));
    }

    await runPandoc(runner, config.tools.pandoc, args);
    console.log(`Exported: ${outputPath}`);
  } finally {
    // Cleanup temp files
    await rm(tmpDir, { recursive: true, force: true }).catch(() => {});
  }
}

program
  .name('md-annotate')
  .description('pandoc Markdown preprocessor for annotations, cross-references and generated figures')
  .version(VERSION)
  .argument('<input>', 'Input markdown file')
  .option('-o, --output <file>', 'Output file (default: input with new extension)')
  .option('-t, --to <format>', `Output format: ${OUTPUT_FORMATS.join(', ')} (default: latex)`)
  .option('-c, --config <file>', 'Config file (default: md-annotate.config.json)')
  .option('--asset-dir <dir>', 'Directory for generated and mirrored images (default: ~/tmp/pandoc/Figures)')
  .option('--font-family <package>', 'LaTeX font package for TikZ figures (default: fbb)')
  .option('--no-process-images', 'Leave image references untouched')
  .option('--draft', 'Show comments, margin notes and fixmes with draft markup')
  .option('--no-word-count', 'Do not print the word count')
  .option('--markdown-only', 'Write the preprocessed Markdown instead of running pandoc')
  .option('--pandoc <path>', 'Path to pandoc')
  .option('--pdflatex <path>', 'Path to pdflatex')
  .option('--dot <path>', 'Path to dot (Graphviz)')
  .option('--convert <path>', 'Path to convert (ImageMagick)')
  .option('--timeout <ms>', 'Time limit for each external tool run')
  .option('--verbose', 'Verbose output')
  .allowUnknownOption(true) // Allow pass-through to pandoc
  .action(async (input: string, options: CliOptions) => {
    // Get pass-through args (unknown options go to pandoc)
    const passThrough = program.args.slice(1); // Everything after input file

    try {
      await run(input, options, passThrough);
    } catch (err) {
      console.error(err instanceof Error ? err.message : err);
      process.exit(err instanceof FilterError ? err.exitCode : 1);
    }
  });

// Parse command line
program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
