/**
 * pandoc command building utilities
 *
 * The preprocessed Markdown is handed to pandoc as a file; these helpers build
 * the argument list and pick the default output path.
 */

import { basename, dirname, extname, join } from 'path';
import { CommandError, type CommandRunner } from './assets/tools';
import { FilterError } from './errors';
import type { OutputFormat } from './types';

export interface PandocOptions {
  /** pandoc writer */
  format: OutputFormat;
  /** Output file path */
  outputPath: string;
  /** Directory pandoc looks in for relative resources (images left unprocessed) */
  resourcePath?: string;
  /** Additional pandoc arguments */
  additionalArgs?: string[];
}

/**
 * Output file extension pandoc infers the final product from
 */
export function defaultOutputExtension(format: OutputFormat): string {
  switch (format) {
    case 'latex':
    case 'beamer':
      return '.pdf';
    case 'html':
    case 'html4':
    case 'html5':
    case 'revealjs':
      return '.html';
    case 'docx':
      return '.docx';
    case 'markdown':
      return '.annotated.md';
  }
}

/**
 * Output path beside the input: `chapter.md` -> `chapter.pdf`
 */
export function defaultOutputPath(inputPath: string, format: OutputFormat): string {
  const base = basename(inputPath, extname(inputPath));
  return join(dirname(inputPath), `${base}${defaultOutputExtension(format)}`);
}

/**
 * Build the pandoc argument list
 *
 * @example
 * buildPandocArgs('/tmp/in.md', { format: 'latex', outputPath: 'out.pdf' })
 * // => ['-f', 'markdown', '-t', 'latex', '-o', 'out.pdf', '/tmp/in.md']
 */
export function buildPandocArgs(inputPath: string, options: PandocOptions): string[] {
  const args = ['-f', 'markdown', '-t', options.format, '-o', options.outputPath];

  if (options.resourcePath) {
    args.push(`--resource-path=${options.resourcePath}`);
  }

  // Additional arguments
  if (options.additionalArgs && options.additionalArgs.length > 0) {
    args.push(...options.additionalArgs);
  }

  // Input file (must be last)
  args.push(inputPath);

  return args;
}

/**
 * Run pandoc; a failing run becomes a FilterError carrying pandoc's diagnostics
 */
export async function runPandoc(
  runner: CommandRunner,
  pandocPath: string,
  args: string[],
): Promise<void> {
  try {
    await runner.run(pandocPath, args);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const exitCode = error instanceof CommandError && error.exitCode ? error.exitCode : 1;
    throw new FilterError('PANDOC_FAILED', `pandoc failed: ${message}`, exitCode);
  }
}
