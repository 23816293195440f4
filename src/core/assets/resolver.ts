/**
 * Asset resolver: turns a diagram source or image reference into a file the
 * output format can use, regenerating only what is missing or out of date.
 *
 * Cache policy per descriptor kind:
 * - embedded diagrams are content-addressed; an existing artifact is always valid
 * - remote images are fetched once; an existing mirror is never re-checked
 * - local files (and .tex/.dot sources) are compared by modification time
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { homedir, tmpdir } from 'os';
import { isAbsolute, join, resolve as resolvePath } from 'path';
import type {
  ImageFormat,
  Logger,
  ResolutionError,
  ResolutionErrorKind,
  ResolutionResult,
  SourceDescriptor,
} from '../types';
import { addressOf } from './contentAddress';
import { fileExists, isStale } from './freshness';
import { KeyedLock } from './keyedLock';
import type { ToolInvoker, ToolResult } from './tools';

/** Font package used for TikZ figures unless the document names one */
export const DEFAULT_FONT = 'fbb';

export interface AssetResolverOptions {
  /** Managed directory all artifacts are written to */
  assetDir: string;
  tools: ToolInvoker;
  /** Default: DEFAULT_FONT */
  fontFamily?: string;
  /** When false, file-backed references are returned untouched. Default: true */
  processImages?: boolean;
  /** Directory relative local references are resolved from. Default: cwd */
  baseDir?: string;
  /** Expansion of a leading `~/`. Default: os.homedir() */
  homeDir?: string;
  logger?: Logger;
  /** Share one lock between resolvers writing to the same directory */
  lock?: KeyedLock;
}

/**
 * Reference split into the pieces the cache paths are built from
 */
export interface ParsedReference {
  /** Reference to read from, with the assumed extension appended if it had none */
  source: string;
  /** Last path segment without extension */
  baseName: string;
  /** Extension including the dot */
  extension: string;
  /** True when the extension was assumed */
  assumedExtension: boolean;
}

/**
 * Split a path or URL into base name and extension.
 * References without a letters-only extension get the target extension.
 */
export function parseReference(reference: string, targetExt: string): ParsedReference {
  const match = reference.match(/([^/]*)(\.[A-Za-z]+)$/);
  if (match) {
    return {
      source: reference,
      baseName: match[1],
      extension: match[2],
      assumedExtension: false,
    };
  }
  const lastSegment = reference.split('/').filter(Boolean).pop() ?? reference;
  return {
    source: `${reference}${targetExt}`,
    baseName: lastSegment,
    extension: targetExt,
    assumedExtension: true,
  };
}

/**
 * Standalone LaTeX document around a TikZ picture
 */
export function wrapTikz(code: string, font: string, library?: string): string {
  let header =
    '\\documentclass{standalone}\n' +
    `\\usepackage{${font}}\n` +
    '\\usepackage{tikz}\n';
  if (library) {
    header += `\\usetikzlibrary{${library}}\n`;
  }
  header += '\\begin{document}\n';
  return `${header}${code}\n\\end{document}\n`;
}

/**
 * Outcome of one locked step: a failure, or whether a file was (re)written
 */
type StepOutcome = { error: ResolutionError } | { generated: boolean };

function isEmbedded(descriptor: SourceDescriptor): boolean {
  return descriptor.kind === 'embedded-tikz' || descriptor.kind === 'embedded-dot';
}

/**
 * Error kind reported when something outside the tools fails (scratch files, mkdir)
 */
function unexpectedFailureKind(descriptor: SourceDescriptor): ResolutionErrorKind {
  switch (descriptor.kind) {
    case 'remote-url':
      return 'DownloadFailed';
    case 'local-file':
      return 'CopyFailed';
    default:
      return 'TypesetFailed';
  }
}

export class AssetResolver {
  private assetDir: string;
  private tools: ToolInvoker;
  private fontFamily: string;
  private processImages: boolean;
  private baseDir: string;
  private homeDir: string;
  private logger: Logger;
  private lock: KeyedLock;

  constructor(options: AssetResolverOptions) {
    this.assetDir = options.assetDir;
    this.tools = options.tools;
    this.fontFamily = options.fontFamily || DEFAULT_FONT;
    this.processImages = options.processImages !== false;
    this.baseDir = options.baseDir || process.cwd();
    this.homeDir = options.homeDir || homedir();
    this.logger = options.logger || console;
    this.lock = options.lock || new KeyedLock();
  }

  /**
   * Cache key of an embedded diagram (content hash) or a file-backed
   * reference (its base name)
   */
  cacheKeyFor(descriptor: SourceDescriptor, targetFormat: ImageFormat): string {
    if (isEmbedded(descriptor)) {
      return addressOf(descriptor.payload, this.fontFor(descriptor));
    }
    const reference =
      descriptor.kind === 'remote-url'
        ? descriptor.payload
        : descriptor.payload.replace(/%20/g, '_');
    return parseReference(reference, `.${targetFormat}`).baseName;
  }

  /**
   * Materialize one descriptor. Never rejects: failures come back as
   * `{ ok: false }` so the rest of the document can still be processed.
   */
  async resolve(
    descriptor: SourceDescriptor,
    targetFormat: ImageFormat,
  ): Promise<ResolutionResult> {
    try {
      switch (descriptor.kind) {
        case 'embedded-tikz':
        case 'embedded-dot':
          return await this.resolveEmbedded(descriptor, targetFormat);
        case 'remote-url':
          if (!this.processImages) return this.unprocessed(descriptor);
          return await this.resolveRemote(descriptor, targetFormat);
        case 'local-file':
        case 'local-tex':
        case 'local-dot':
          if (!this.processImages) return this.unprocessed(descriptor);
          return await this.resolveLocal(descriptor, targetFormat);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return this.fail(descriptor, {
        kind: unexpectedFailureKind(descriptor),
        resource: descriptor.payload,
        message,
      });
    }
  }

  private fontFor(descriptor: SourceDescriptor): string {
    if (descriptor.kind !== 'embedded-tikz') return '';
    return descriptor.renderParams.fontFamily || this.fontFamily;
  }

  private unprocessed(descriptor: SourceDescriptor): ResolutionResult {
    this.logger.log(`Not processing image ${descriptor.payload}.`);
    return { ok: true, path: descriptor.payload, status: 'unprocessed', descriptor };
  }

  private fail(descriptor: SourceDescriptor, error: ResolutionError): ResolutionResult {
    this.logger.error(`ERROR: ${error.message}`);
    return { ok: false, error, descriptor };
  }

  /**
   * Log a tool outcome and turn a failure into a ResolutionError
   */
  private check(
    result: ToolResult,
    kind: ResolutionErrorKind,
    resource: string,
  ): ResolutionError | null {
    if (result.ok) {
      if (result.message) this.logger.log(result.message);
      return null;
    }
    return { kind, resource, message: result.message };
  }

  private async resolveEmbedded(
    descriptor: SourceDescriptor,
    targetFormat: ImageFormat,
  ): Promise<ResolutionResult> {
    const font = this.fontFor(descriptor);
    const key = addressOf(descriptor.payload, font);
    const outfile = join(this.assetDir, `${key}.${targetFormat}`);

    return this.lock.run(outfile, async (): Promise<ResolutionResult> => {
      if (await fileExists(outfile)) {
        this.logger.log(`${outfile} already exists.`);
        return { ok: true, path: outfile, status: 'cached', descriptor };
      }

      const scratch = await mkdtemp(join(tmpdir(), 'md-annotate-'));
      try {
        let error: ResolutionError | null;
        if (descriptor.kind === 'embedded-tikz') {
          const texFile = join(scratch, `${key}.tex`);
          await writeFile(
            texFile,
            wrapTikz(descriptor.payload, font, descriptor.renderParams.tikzLibrary),
          );
          // LaTeX only produces PDF: typeset straight into place or convert afterwards
          const pdfDir = targetFormat === 'pdf' ? this.assetDir : scratch;
          const typeset = await this.tools.typesetTex(texFile, pdfDir, key);
          error = this.check(typeset, 'TypesetFailed', outfile);
          if (!error && typeset.ok && targetFormat !== 'pdf') {
            error = this.check(
              await this.tools.convertFormat(typeset.path, outfile),
              'ConvertFailed',
              outfile,
            );
          }
        } else {
          const dotFile = join(scratch, `${key}.dot`);
          await writeFile(dotFile, descriptor.payload);
          error = this.check(
            await this.tools.typesetDot(dotFile, outfile, targetFormat),
            'TypesetFailed',
            outfile,
          );
        }

        if (error) return this.fail(descriptor, error);
        this.logger.log(`Created image ${outfile}`);
        return { ok: true, path: outfile, status: 'generated', descriptor };
      } finally {
        await rm(scratch, { recursive: true, force: true }).catch(() => {});
      }
    });
  }

  private async resolveRemote(
    descriptor: SourceDescriptor,
    targetFormat: ImageFormat,
  ): Promise<ResolutionResult> {
    const targetExt = `.${targetFormat}`;
    const ref = parseReference(descriptor.payload, targetExt);
    if (ref.assumedExtension) {
      this.logger.warn(
        `WARNING: Cannot find extension for ${descriptor.payload}. Assuming ${targetExt}.`,
      );
    }
    const mirror = join(this.assetDir, ref.baseName + ref.extension);

    const mirrored = await this.lock.run(mirror, async (): Promise<StepOutcome> => {
      // Remote staleness is never checked: only a missing mirror triggers a fetch
      if (await fileExists(mirror)) {
        this.logger.log(`${ref.source} already exists.`);
        return { generated: false };
      }
      this.logger.log(`Downloading ${ref.source} to ${mirror}.`);
      const error = this.check(
        await this.tools.download(ref.source, mirror),
        'DownloadFailed',
        ref.source,
      );
      return error ? { error } : { generated: true };
    });

    if ('error' in mirrored) return this.fail(descriptor, mirrored.error);
    if (ref.extension === targetExt) {
      return this.done(descriptor, mirror, mirrored.generated);
    }

    const converted = join(this.assetDir, ref.baseName + targetExt);
    const conversion = await this.convert(
      mirror,
      converted,
      async () => !(await fileExists(converted)),
    );
    if ('error' in conversion) return this.fail(descriptor, conversion.error);
    return this.done(descriptor, converted, mirrored.generated || conversion.generated);
  }

  /**
   * Absolute filesystem path of a local reference
   */
  localPathOf(reference: string): string {
    let path = reference.replace(/%20/g, ' ');
    if (path.startsWith('~/')) {
      path = join(this.homeDir, path.slice(2));
    }
    return isAbsolute(path) ? path : resolvePath(this.baseDir, path);
  }

  private async resolveLocal(
    descriptor: SourceDescriptor,
    targetFormat: ImageFormat,
  ): Promise<ResolutionResult> {
    const targetExt = `.${targetFormat}`;
    const ref = parseReference(descriptor.payload, targetExt);
    if (ref.assumedExtension) {
      this.logger.warn(
        `WARNING: Cannot find extension for ${descriptor.payload}. Assuming ${targetExt}.`,
      );
    }

    const source = this.localPathOf(ref.source);
    if (!(await fileExists(source))) {
      return this.fail(descriptor, {
        kind: 'SourceNotFound',
        resource: source,
        message: `Cannot find ${source}.`,
      });
    }

    // Typesetting decides the mirror's format: LaTeX gives PDF, dot renders the target directly
    let mirrorExt = ref.extension;
    if (ref.extension === '.tex') {
      mirrorExt = '.pdf';
    } else if (ref.extension === '.dot') {
      mirrorExt = targetExt;
    }
    const baseName = ref.baseName.replace(/%20/g, '_');
    const mirror = join(this.assetDir, baseName + mirrorExt);

    const mirrored = await this.lock.run(mirror, async (): Promise<StepOutcome> => {
      if (!(await isStale(source, mirror))) return { generated: false };

      let error: ResolutionError | null;
      if (ref.extension === '.tex') {
        error = this.check(
          await this.tools.typesetTex(source, this.assetDir, baseName),
          'TypesetFailed',
          source,
        );
      } else if (ref.extension === '.dot') {
        error = this.check(
          await this.tools.typesetDot(source, mirror, targetFormat),
          'TypesetFailed',
          source,
        );
      } else {
        error = this.check(await this.tools.copy(source, mirror), 'CopyFailed', source);
      }
      return error ? { error } : { generated: true };
    });

    if ('error' in mirrored) return this.fail(descriptor, mirrored.error);
    if (mirrorExt === targetExt) {
      return this.done(descriptor, mirror, mirrored.generated);
    }

    const converted = join(this.assetDir, baseName + targetExt);
    const conversion = await this.convert(mirror, converted, () => isStale(mirror, converted));
    if ('error' in conversion) return this.fail(descriptor, conversion.error);
    return this.done(descriptor, converted, mirrored.generated || conversion.generated);
  }

  /**
   * Convert the mirror under the converted file's lock alone. The mirror's
   * lock is released by then, so no resolution ever holds two locks.
   */
  private convert(
    mirror: string,
    converted: string,
    needed: () => Promise<boolean>,
  ): Promise<StepOutcome> {
    return this.lock.run(converted, async (): Promise<StepOutcome> => {
      if (!(await needed())) return { generated: false };
      const error = this.check(
        await this.tools.convertFormat(mirror, converted),
        'ConvertFailed',
        mirror,
      );
      return error ? { error } : { generated: true };
    });
  }

  private done(descriptor: SourceDescriptor, path: string, generated: boolean): ResolutionResult {
    return { ok: true, path, status: generated ? 'generated' : 'cached', descriptor };
  }
}
