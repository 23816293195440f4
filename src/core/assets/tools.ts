/**
 * External tool wrappers used to materialize assets
 *
 * Requires (on PATH or configured): pdflatex, dot (Graphviz), convert (ImageMagick)
 *
 * None of these operations reject. Each writes to a partial file next to its
 * destination and renames it into place only once the tool has succeeded, so
 * the destination either holds a complete artifact or is left untouched.
 */

import { execFile } from 'child_process';
import { copyFile, mkdir, mkdtemp, rename, rm, unlink, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, dirname, extname, join, resolve } from 'path';
import type { ImageFormat } from '../types';
import { fileExists } from './freshness';

export type ToolResult =
  | { ok: true; path: string; message?: string }
  | { ok: false; message: string };

/**
 * Operations the asset resolver needs from the outside world
 */
export interface ToolInvoker {
  /** Fetch a remote resource to destPath */
  download(url: string, destPath: string): Promise<ToolResult>;

  /**
   * Typeset a .tex file with LaTeX; the PDF lands in outputDir as
   * `<outputName>.pdf` (default: the source's base name)
   */
  typesetTex(
    sourceFile: string,
    outputDir: string,
    outputName?: string,
  ): Promise<ToolResult>;

  /** Render a Graphviz file directly to the requested format */
  typesetDot(
    sourceFile: string,
    outputFile: string,
    format: ImageFormat,
  ): Promise<ToolResult>;

  /** Change file format; the target format follows outputFile's extension */
  convertFormat(inputFile: string, outputFile: string): Promise<ToolResult>;

  /** Plain filesystem copy */
  copy(sourceFile: string, destFile: string): Promise<ToolResult>;
}

/**
 * Runs one external command to completion.
 * Rejects with the tool's diagnostic output when it fails.
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: { cwd?: string }): Promise<void>;
}

/**
 * URL fetcher function signature
 * Allows different implementations (e.g., fetch, a test double)
 */
export type UrlFetcher = (url: string) => Promise<ArrayBuffer>;

/**
 * Default fetcher: redirect-following GET, non-2xx is an error
 */
export const fetchUrl: UrlFetcher = async (url) => {
  const response = await fetch(url, { redirect: 'follow' });
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} ${response.statusText}`);
  }
  return response.arrayBuffer();
};

/**
 * Rejection of a CommandRunner: the tool's diagnostics plus its exit code
 */
export class CommandError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
  ) {
    super(message);
    this.name = 'CommandError';
  }
}

function lastLines(output: string, count: number): string {
  return output.trim().split('\n').slice(-count).join('\n');
}

/**
 * CommandRunner backed by child_process.execFile
 */
export function execFileRunner(options: { timeout?: number } = {}): CommandRunner {
  return {
    run(command, args, runOptions = {}) {
      return new Promise<void>((resolvePromise, reject) => {
        execFile(
          command,
          args,
          {
            cwd: runOptions.cwd,
            timeout: options.timeout ?? 0,
            maxBuffer: 16 * 1024 * 1024,
          },
          (error, stdout, stderr) => {
            if (error) {
              // LaTeX reports on stdout, everything else on stderr
              const detail = lastLines(stderr || stdout, 5);
              const exitCode = typeof error.code === 'number' ? error.code : null;
              reject(new CommandError(detail || error.message, exitCode));
            } else {
              resolvePromise();
            }
          },
        );
      });
    },
  };
}

export interface ExternalToolsOptions {
  runner?: CommandRunner;
  fetchUrl?: UrlFetcher;
  /** Default: 'pdflatex' */
  pdflatexPath?: string;
  /** Default: 'dot' */
  dotPath?: string;
  /** Default: 'convert' */
  convertPath?: string;
  /** Rasterization density passed to convert. Default: 300 */
  density?: number;
  /** Output quality passed to convert. Default: 100 */
  quality?: number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Sibling path a tool writes to before the result is renamed into place.
 * Keeps the extension so converters can infer the format from it.
 */
export function partialPathFor(destPath: string): string {
  const ext = extname(destPath);
  const random = Math.random().toString(36).substring(2, 8);
  return join(
    dirname(destPath),
    `.${basename(destPath, ext)}.partial-${random}${ext}`,
  );
}

/**
 * Default ToolInvoker: shells out to pdflatex, dot and convert
 */
export class ExternalTools implements ToolInvoker {
  private runner: CommandRunner;
  private fetchUrl: UrlFetcher;
  private pdflatexPath: string;
  private dotPath: string;
  private convertPath: string;
  private density: number;
  private quality: number;

  constructor(options: ExternalToolsOptions = {}) {
    this.runner = options.runner || execFileRunner();
    this.fetchUrl = options.fetchUrl || fetchUrl;
    this.pdflatexPath = options.pdflatexPath || 'pdflatex';
    this.dotPath = options.dotPath || 'dot';
    this.convertPath = options.convertPath || 'convert';
    this.density = options.density ?? 300;
    this.quality = options.quality ?? 100;
  }

  /**
   * Run `produce` against a partial path and move the result to destPath
   */
  private async writeAtomically(
    destPath: string,
    produce: (partialPath: string) => Promise<void>,
    action: { done: string; failed: string },
  ): Promise<ToolResult> {
    const partial = partialPathFor(destPath);
    try {
      await mkdir(dirname(destPath), { recursive: true });
      await produce(partial);
      if (!(await fileExists(partial))) {
        throw new Error('tool reported success but produced no output');
      }
      await rename(partial, destPath);
      return { ok: true, path: destPath, message: `Successfully ${action.done}.` };
    } catch (error) {
      await unlink(partial).catch(() => {});
      return {
        ok: false,
        message: `Could not ${action.failed}: ${errorMessage(error)}`,
      };
    }
  }

  async download(url: string, destPath: string): Promise<ToolResult> {
    return this.writeAtomically(
      destPath,
      async (partial) => {
        const data = await this.fetchUrl(url);
        await writeFile(partial, Buffer.from(data));
      },
      {
        done: `downloaded ${url} to ${destPath}`,
        failed: `download ${url}`,
      },
    );
  }

  async typesetTex(
    sourceFile: string,
    outputDir: string,
    outputName?: string,
  ): Promise<ToolResult> {
    const source = resolve(sourceFile);
    const base = basename(source, '.tex');
    const destPath = join(outputDir, `${outputName ?? base}.pdf`);

    let scratch: string | null = null;
    try {
      scratch = await mkdtemp(join(tmpdir(), 'md-annotate-tex-'));
      const scratchDir = scratch;
      return await this.writeAtomically(
        destPath,
        async (partial) => {
          await this.runner.run(
            this.pdflatexPath,
            [
              '-interaction=nonstopmode',
              '-halt-on-error',
              '-output-directory',
              scratchDir,
              source,
            ],
            { cwd: dirname(source) },
          );
          await copyFile(join(scratchDir, `${base}.pdf`), partial);
        },
        { done: `typeset ${sourceFile}`, failed: `typeset ${sourceFile}` },
      );
    } catch (error) {
      return {
        ok: false,
        message: `Could not typeset ${sourceFile}: ${errorMessage(error)}`,
      };
    } finally {
      if (scratch) {
        await rm(scratch, { recursive: true, force: true }).catch(() => {});
      }
    }
  }

  async typesetDot(
    sourceFile: string,
    outputFile: string,
    format: ImageFormat,
  ): Promise<ToolResult> {
    return this.writeAtomically(
      outputFile,
      (partial) =>
        this.runner.run(this.dotPath, [`-T${format}`, '-o', partial, sourceFile]),
      { done: `typeset ${sourceFile}`, failed: `typeset ${sourceFile}` },
    );
  }

  async convertFormat(inputFile: string, outputFile: string): Promise<ToolResult> {
    return this.writeAtomically(
      outputFile,
      (partial) =>
        this.runner.run(this.convertPath, [
          '-density',
          String(this.density),
          inputFile,
          '-quality',
          String(this.quality),
          partial,
        ]),
      {
        done: `converted ${inputFile} to ${outputFile}`,
        failed: `convert ${inputFile} to ${outputFile}`,
      },
    );
  }

  async copy(sourceFile: string, destFile: string): Promise<ToolResult> {
    return this.writeAtomically(
      destFile,
      (partial) => copyFile(sourceFile, partial),
      {
        done: `copied ${sourceFile} to ${destFile}`,
        failed: `copy ${sourceFile} to ${destFile}`,
      },
    );
  }
}
