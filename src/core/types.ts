/**
 * Core types shared between the asset pipeline, the preprocessor and the CLI
 */

/**
 * Output formats the preprocessor knows how to rewrite for.
 * Anything pandoc accepts beyond these is rejected by the CLI.
 */
export type OutputFormat =
  | 'latex'
  | 'beamer'
  | 'html'
  | 'html4'
  | 'html5'
  | 'revealjs'
  | 'docx'
  | 'markdown';

export const OUTPUT_FORMATS: readonly OutputFormat[] = [
  'latex',
  'beamer',
  'html',
  'html4',
  'html5',
  'revealjs',
  'docx',
  'markdown',
];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function isLatexFormat(format: OutputFormat): boolean {
  return format === 'latex' || format === 'beamer';
}

export function isHtmlFormat(format: OutputFormat): boolean {
  return format === 'html' || format === 'html4' || format === 'html5';
}

/**
 * Image file format an artifact is materialized as
 */
export type ImageFormat = 'pdf' | 'png';

/**
 * LaTeX-family outputs take PDF figures, everything else PNG
 */
export function imageFormatFor(format: OutputFormat): ImageFormat {
  return isLatexFormat(format) ? 'pdf' : 'png';
}

export type SourceKind =
  | 'embedded-tikz'
  | 'embedded-dot'
  | 'local-file'
  | 'local-tex'
  | 'local-dot'
  | 'remote-url';

export interface RenderParams {
  /** LaTeX font package for TikZ figures */
  fontFamily?: string;
  /** Comma-separated list for \usetikzlibrary{} */
  tikzLibrary?: string;
  caption?: string;
  title?: string;
}

/**
 * One diagram or image to materialize.
 * `payload` is source text for embedded kinds and a path or URL otherwise.
 */
export interface SourceDescriptor {
  readonly kind: SourceKind;
  readonly payload: string;
  readonly renderParams: Readonly<RenderParams>;
}

export type ResolutionErrorKind =
  | 'SourceNotFound'
  | 'DownloadFailed'
  | 'TypesetFailed'
  | 'ConvertFailed'
  | 'CopyFailed';

export interface ResolutionError {
  kind: ResolutionErrorKind;
  /** The path or URL the failure is about */
  resource: string;
  message: string;
}

export type ResolutionStatus = 'generated' | 'cached' | 'unprocessed';

export type ResolutionResult =
  | {
      ok: true;
      path: string;
      status: ResolutionStatus;
      descriptor: SourceDescriptor;
    }
  | {
      ok: false;
      error: ResolutionError;
      descriptor: SourceDescriptor;
    };

/**
 * Diagnostic side channel. Defaults to `console` everywhere.
 */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

/**
 * Check if a reference is a remote http(s) URL
 */
export function isRemoteUrl(path: string): boolean {
  return /^https?:\/\//.test(path);
}

/**
 * Classify an image reference by its location and extension
 */
export function describeImageReference(src: string): SourceDescriptor {
  let kind: SourceKind = 'local-file';
  if (isRemoteUrl(src)) {
    kind = 'remote-url';
  } else if (/\.tex$/.test(src)) {
    kind = 'local-tex';
  } else if (/\.dot$/.test(src)) {
    kind = 'local-dot';
  }
  return { kind, payload: src, renderParams: {} };
}
