/**
 * Annotation, block and cross-reference handling
 *
 * Decides what each special fenced div or span turns into for the active
 * output format and the document's draft/print/hide settings.
 */

import {
  type AnnotationKind,
  type BlockKind,
  type InlineKind,
  rawBlock,
  rawInline,
  templatesFor,
} from './formats';
import type { OutputFormat, ResolutionError } from './types';
import { isLatexFormat } from './types';

/**
 * How an annotation kind is displayed:
 * - draft: with its colored/marked-up markup
 * - print: as ordinary text
 * - hide: not at all
 */
export type Visibility = 'draft' | 'print' | 'hide';

export type AnnotationSettings = Record<AnnotationKind, Visibility>;

export function isVisibility(value: unknown): value is Visibility {
  return value === 'draft' || value === 'print' || value === 'hide';
}

/**
 * Settings implied by `draft: true|false` before per-kind overrides
 */
export function annotationDefaults(draft: boolean): AnnotationSettings {
  if (draft) {
    return { comment: 'draft', margin: 'draft', fixme: 'draft', highlight: 'draft' };
  }
  return { comment: 'hide', margin: 'hide', fixme: 'print', highlight: 'print' };
}

export function resolveAnnotationSettings(
  draft: boolean,
  overrides: Partial<AnnotationSettings> = {},
): AnnotationSettings {
  const defaults = annotationDefaults(draft);
  return {
    comment: overrides.comment ?? defaults.comment,
    margin: overrides.margin ?? defaults.margin,
    fixme: overrides.fixme ?? defaults.fixme,
    highlight: overrides.highlight ?? defaults.highlight,
  };
}

const BLOCK_KINDS: readonly BlockKind[] = ['comment', 'box', 'center'];

const INLINE_KINDS: readonly InlineKind[] = [
  'comment',
  'margin',
  'fixme',
  'highlight',
  'smcaps',
  'i',
  'l',
  'r',
  'rp',
];

export function toBlockKind(className: string | undefined): BlockKind | null {
  return BLOCK_KINDS.find((kind) => kind === className) ?? null;
}

export function toInlineKind(className: string | undefined): InlineKind | null {
  return INLINE_KINDS.find((kind) => kind === className) ?? null;
}

/**
 * State collected while walking one document and consulted once at the end
 */
export interface DocumentAccumulator {
  /** A box block was rendered for LaTeX, so mdframed must be loaded */
  boxUsed: boolean;
  errors: ResolutionError[];
}

export function createAccumulator(): DocumentAccumulator {
  return { boxUsed: false, errors: [] };
}

export interface AnnotationContext {
  format: OutputFormat;
  settings: AnnotationSettings;
  accumulator: DocumentAccumulator;
}

/**
 * What to do with a fenced div
 */
export type BlockAction =
  | { type: 'keep' }
  | { type: 'remove' }
  | { type: 'unwrap' }
  | { type: 'wrap'; open: string | null; close: string | null };

function assertNever(value: never): never {
  throw new Error(`Unhandled kind: ${String(value)}`);
}

export function blockAction(kind: BlockKind, context: AnnotationContext): BlockAction {
  const templates = templatesFor(context.format);
  if (!templates) return { type: 'keep' };

  switch (kind) {
    case 'comment': {
      const visibility = context.settings.comment;
      if (visibility === 'hide') return { type: 'remove' };
      if (visibility === 'print') return { type: 'unwrap' };
      break;
    }
    case 'box':
      if (isLatexFormat(context.format)) {
        context.accumulator.boxUsed = true;
      }
      break;
    case 'center':
      break;
    default:
      return assertNever(kind);
  }

  const wrap = templates.blocks[kind];
  return {
    type: 'wrap',
    open: rawBlock(wrap.open, templates.raw),
    close: rawBlock(wrap.close, templates.raw),
  };
}

/**
 * Span content in two forms: the Markdown as written and its plain text
 */
export interface SpanContent {
  markdown: string;
  plain: string;
}

/**
 * Replacement Markdown for a span, or null to leave it as written
 */
export function renderInline(
  kind: InlineKind,
  content: SpanContent,
  context: AnnotationContext,
): string | null {
  const templates = templatesFor(context.format);
  if (!templates) return null;

  switch (kind) {
    case 'comment':
    case 'margin':
    case 'fixme':
    case 'highlight': {
      const visibility = context.settings[kind];
      if (visibility === 'hide') return '';
      if (visibility === 'print') return content.markdown;
      const wrap = templates.annotations[kind];
      return (
        rawInline(wrap.open, templates.raw) +
        content.markdown +
        rawInline(wrap.close, templates.raw)
      );
    }
    case 'smcaps':
      return `[${content.markdown}]{.smallcaps}`;
    case 'i': {
      if (!templates.index) return '';
      // Word index entries use ':' for subentries where LaTeX uses '!'
      const entry =
        templates.raw === 'openxml' ? content.plain.replace(/!/g, ':') : content.plain;
      return rawInline(templates.index.open + entry + templates.index.close, templates.raw);
    }
    case 'l':
    case 'r':
    case 'rp': {
      const wrap = templates.crossRefs[kind];
      if (!wrap.open && !wrap.close) return '';
      return rawInline(wrap.open + content.plain + wrap.close, templates.raw);
    }
    default:
      return assertNever(kind);
  }
}

/**
 * Replacement for the `< ` that marks a non-indented paragraph
 */
export function noIndentPrefix(format: OutputFormat): string | null {
  const templates = templatesFor(format);
  if (!templates) return null;
  return rawInline(templates.noindent, templates.raw);
}

/**
 * LaTeX packages the rendered document needs in its header
 */
export function requiredLatexPackages(
  format: OutputFormat,
  settings: AnnotationSettings,
  accumulator: DocumentAccumulator,
): string[] {
  if (!isLatexFormat(format)) return [];

  const packages: string[] = [];
  if (accumulator.boxUsed) {
    packages.push('mdframed');
  }
  if (
    settings.comment === 'draft' ||
    settings.margin === 'draft' ||
    settings.fixme === 'draft'
  ) {
    packages.push('xcolor');
  }
  return packages;
}
