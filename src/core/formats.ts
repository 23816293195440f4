/**
 * Per-format markup for annotations, blocks and cross-references
 *
 * Every supported output format gets one FormatTemplates table. The
 * preprocessor emits these strings as pandoc raw inlines/blocks
 * (`` `...`{=latex} ``), so pandoc passes them through untouched.
 */

import type { OutputFormat } from './types';
import { isHtmlFormat, isLatexFormat } from './types';

/** Fenced div classes with special handling */
export type BlockKind = 'comment' | 'box' | 'center';

/** Annotation spans whose display follows the draft/print/hide settings */
export type AnnotationKind = 'comment' | 'margin' | 'fixme' | 'highlight';

/** Cross-reference spans: label, reference, page reference */
export type CrossRefKind = 'l' | 'r' | 'rp';

/** Every span class with special handling */
export type InlineKind = AnnotationKind | CrossRefKind | 'smcaps' | 'i';

/** pandoc raw attribute names */
export type RawFormat = 'latex' | 'html' | 'openxml';

export interface Wrap {
  open: string;
  close: string;
}

export interface FormatTemplates {
  raw: RawFormat;
  blocks: Record<BlockKind, Wrap>;
  annotations: Record<AnnotationKind, Wrap>;
  crossRefs: Record<CrossRefKind, Wrap>;
  /** Index entry markup; null drops index entries */
  index: Wrap | null;
  /** Prefix for paragraphs that must not be indented */
  noindent: string;
}

export const COLORS = {
  blockComment: 'red',
  comment: 'red',
  highlight: 'yellow',
  margin: 'red',
  fixme: 'cyan',
} as const;

const MARGIN_STYLE =
  'max-width:20%; border: 1px solid black; padding: 1ex; ' +
  'margin: 1ex; float:right; font-size: small;';

const EMPTY: Wrap = { open: '', close: '' };

const LATEX: FormatTemplates = {
  raw: 'latex',
  blocks: {
    comment: {
      open: `\\color{${COLORS.blockComment}}{}`,
      close: '\\color{black}{}',
    },
    box: {
      open: '\\medskip\\begin{mdframed}',
      close: '\\end{mdframed}\\medskip{}',
    },
    center: { open: '\\begin{center}', close: '\\end{center}' },
  },
  annotations: {
    comment: { open: `\\textcolor{${COLORS.comment}}{`, close: '}' },
    highlight: { open: '\\hl{', close: '}' },
    margin: {
      open: `\\marginpar{\\begin{flushleft}\\scriptsize{\\textcolor{${COLORS.margin}}{`,
      close: '}}\\end{flushleft}}',
    },
    fixme: {
      open:
        `\\marginpar{\\scriptsize{\\textcolor{${COLORS.fixme}}{Fix this!}}}` +
        `\\textcolor{${COLORS.fixme}}{`,
      close: '}',
    },
  },
  crossRefs: {
    l: { open: '\\label{', close: '}' },
    r: { open: '\\autoref{', close: '}' },
    rp: { open: '\\autopageref{', close: '}' },
  },
  index: { open: '\\index{', close: '}' },
  noindent: '\\noindent{}',
};

const HTML: FormatTemplates = {
  raw: 'html',
  blocks: {
    comment: {
      open: `<div style="color: ${COLORS.blockComment};">`,
      close: '</div>',
    },
    box: {
      open: '<div style="border:1px solid black; padding:1.5ex;">',
      close: '</div>',
    },
    center: { open: '<div style="text-align:center;">', close: '</div>' },
  },
  annotations: {
    comment: { open: `<span style="color: ${COLORS.comment};">`, close: '</span>' },
    highlight: { open: '<mark>', close: '</mark>' },
    margin: {
      open: `<span style="color: ${COLORS.margin}; ${MARGIN_STYLE}">`,
      close: '</span>',
    },
    fixme: {
      open:
        `<span style="color: ${COLORS.fixme}; ${MARGIN_STYLE}">Fix this!</span>` +
        `<span style="color: ${COLORS.fixme};">`,
      close: '</span>',
    },
  },
  crossRefs: {
    l: { open: '<a name="', close: '"></a>' },
    r: { open: '<a href="#', close: '">here</a>' },
    rp: { open: '<a href="#', close: '">here</a>' },
  },
  index: null,
  noindent: '<p style="text-indent: 0px">',
};

// reveal.js styles paragraphs through its own stylesheet
const REVEALJS: FormatTemplates = {
  ...HTML,
  noindent: '<p class="noindent">',
};

const DOCX: FormatTemplates = {
  raw: 'openxml',
  blocks: { comment: EMPTY, box: EMPTY, center: EMPTY },
  annotations: {
    comment: {
      open: '<w:rPr><w:color w:val="FF0000"/></w:rPr><w:t>',
      close: '</w:t>',
    },
    highlight: {
      open: '<w:rPr><w:highlight w:val="yellow"/></w:rPr><w:t>',
      close: '</w:t>',
    },
    margin: EMPTY,
    fixme: {
      open: '<w:rPr><w:color w:val="0000FF"/></w:rPr><w:t>',
      close: '</w:t>',
    },
  },
  crossRefs: { l: EMPTY, r: EMPTY, rp: EMPTY },
  index: {
    open:
      '<w:r><w:fldChar w:fldCharType="begin"/></w:r>' +
      '<w:r><w:instrText xml:space="preserve"> XE "</w:instrText></w:r>' +
      '<w:r><w:instrText>',
    close:
      '</w:instrText></w:r>' +
      '<w:r><w:instrText xml:space="preserve">" </w:instrText></w:r>' +
      '<w:r><w:fldChar w:fldCharType="end"/></w:r>',
  },
  noindent: '',
};

/**
 * Template table for an output format; null for Markdown, which is left as is
 */
export function templatesFor(format: OutputFormat): FormatTemplates | null {
  if (isLatexFormat(format)) return LATEX;
  if (isHtmlFormat(format)) return HTML;
  if (format === 'revealjs') return REVEALJS;
  if (format === 'docx') return DOCX;
  return null;
}

/**
 * Backtick fence long enough to hold `text` as a code span or block
 */
function fenceFor(text: string, minimum: number): string {
  const runs = text.match(/`+/g) ?? [];
  const longest = runs.reduce((max, run) => Math.max(max, run.length), 0);
  return '`'.repeat(Math.max(minimum, longest + 1));
}

/**
 * pandoc raw inline; empty markup yields an empty string
 *
 * @example
 * rawInline('\\hl{', 'latex') // => '`\\hl{`{=latex}'
 */
export function rawInline(text: string, format: RawFormat): string {
  if (!text) return '';
  return `${codeSpan(text)}{=${format}}`;
}

/**
 * pandoc raw block; empty markup yields null
 */
export function rawBlock(text: string, format: RawFormat): string | null {
  if (!text) return null;
  const fence = fenceFor(text, 3);
  return `${fence}{=${format}}\n${text}\n${fence}`;
}

/**
 * Inline code span holding `text` verbatim
 */
export function codeSpan(text: string): string {
  const fence = fenceFor(text, 1);
  const padded = text.startsWith('`') || text.endsWith('`') ? ` ${text} ` : text;
  return `${fence}${padded}${fence}`;
}
