import { describe, it, expect } from 'vitest';
import {
  type AnnotationContext,
  annotationDefaults,
  blockAction,
  createAccumulator,
  noIndentPrefix,
  renderInline,
  requiredLatexPackages,
  resolveAnnotationSettings,
  toBlockKind,
  toInlineKind,
} from './annotations';
import type { OutputFormat } from './types';

function contextFor(format: OutputFormat, draft = false): AnnotationContext {
  return {
    format,
    settings: annotationDefaults(draft),
    accumulator: createAccumulator(),
  };
}

const text = (markdown: string, plain = markdown) => ({ markdown, plain });

describe('annotation settings', () => {
  it('shows everything as draft in draft mode', () => {
    expect(annotationDefaults(true)).toEqual({
      comment: 'draft',
      margin: 'draft',
      fixme: 'draft',
      highlight: 'draft',
    });
  });

  it('hides comments and margin notes and prints the rest otherwise', () => {
    expect(annotationDefaults(false)).toEqual({
      comment: 'hide',
      margin: 'hide',
      fixme: 'print',
      highlight: 'print',
    });
  });

  it('lets per-kind settings override the defaults', () => {
    expect(resolveAnnotationSettings(false, { comment: 'draft' })).toEqual({
      comment: 'draft',
      margin: 'hide',
      fixme: 'print',
      highlight: 'print',
    });
  });
});

describe('kind lookup', () => {
  it('recognizes block classes', () => {
    expect(toBlockKind('box')).toBe('box');
    expect(toBlockKind('note')).toBeNull();
    expect(toBlockKind(undefined)).toBeNull();
  });

  it('recognizes span classes', () => {
    expect(toInlineKind('rp')).toBe('rp');
    expect(toInlineKind('smallcaps')).toBeNull();
  });
});

describe('blockAction', () => {
  it('removes hidden comment blocks', () => {
    expect(blockAction('comment', contextFor('latex'))).toEqual({ type: 'remove' });
  });

  it('unwraps printed comment blocks', () => {
    const context = contextFor('html');
    context.settings.comment = 'print';
    expect(blockAction('comment', context)).toEqual({ type: 'unwrap' });
  });

  it('wraps draft comment blocks in colored raw blocks', () => {
    expect(blockAction('comment', contextFor('latex', true))).toEqual({
      type: 'wrap',
      open: '```{=latex}\n\\color{red}{}\n```',
      close: '```{=latex}\n\\color{black}{}\n```',
    });
  });

  it('marks a LaTeX box as used', () => {
    const context = contextFor('beamer');
    const action = blockAction('box', context);
    expect(action).toEqual({
      type: 'wrap',
      open: '```{=latex}\n\\medskip\\begin{mdframed}\n```',
      close: '```{=latex}\n\\end{mdframed}\\medskip{}\n```',
    });
    expect(context.accumulator.boxUsed).toBe(true);
  });

  it('does not mark boxes outside LaTeX', () => {
    const context = contextFor('html5');
    blockAction('box', context);
    expect(context.accumulator.boxUsed).toBe(false);
  });

  it('wraps with nothing where the format has no markup', () => {
    expect(blockAction('center', contextFor('docx'))).toEqual({ type: 'wrap', open: null, close: null });
  });

  it('keeps blocks in markdown output', () => {
    expect(blockAction('comment', contextFor('markdown'))).toEqual({ type: 'keep' });
  });
});

describe('renderInline', () => {
  it('drops hidden annotations', () => {
    expect(renderInline('comment', text('note to self'), contextFor('latex'))).toBe('');
  });

  it('prints annotations as plain Markdown', () => {
    expect(renderInline('fixme', text('*check*', 'check'), contextFor('latex'))).toBe('*check*');
  });

  it('wraps draft annotations in raw markup', () => {
    expect(renderInline('highlight', text('key point'), contextFor('latex', true))).toBe(
      '`\\hl{`{=latex}key point`}`{=latex}',
    );
    expect(renderInline('comment', text('aside'), contextFor('html', true))).toBe(
      '`<span style="color: red;">`{=html}aside`</span>`{=html}',
    );
  });

  it('wraps margin notes with empty docx markup as bare text', () => {
    expect(renderInline('margin', text('side'), contextFor('docx', true))).toBe('side');
  });

  it('turns smcaps into pandoc small caps', () => {
    expect(renderInline('smcaps', text('nato'), contextFor('html'))).toBe('[nato]{.smallcaps}');
  });

  it('renders index entries for LaTeX and docx only', () => {
    expect(renderInline('i', text('tree!binary'), contextFor('latex'))).toBe(
      '`\\index{tree!binary}`{=latex}',
    );
    expect(renderInline('i', text('tree!binary'), contextFor('docx'))).toBe(
      '`<w:r><w:fldChar w:fldCharType="begin"/></w:r>' +
        '<w:r><w:instrText xml:space="preserve"> XE "</w:instrText></w:r>' +
        '<w:r><w:instrText>tree:binary</w:instrText></w:r>' +
        '<w:r><w:instrText xml:space="preserve">" </w:instrText></w:r>' +
        '<w:r><w:fldChar w:fldCharType="end"/></w:r>`{=openxml}',
    );
    expect(renderInline('i', text('tree'), contextFor('html'))).toBe('');
  });

  it('renders cross-references from the plain text', () => {
    expect(renderInline('l', text('*fig*', 'fig'), contextFor('latex'))).toBe('`\\label{fig}`{=latex}');
    expect(renderInline('rp', text('fig'), contextFor('latex'))).toBe('`\\autopageref{fig}`{=latex}');
    expect(renderInline('r', text('fig'), contextFor('revealjs'))).toBe('`<a href="#fig">here</a>`{=html}');
    expect(renderInline('l', text('fig'), contextFor('docx'))).toBe('');
  });

  it('leaves spans alone in markdown output', () => {
    expect(renderInline('comment', text('x'), contextFor('markdown'))).toBeNull();
  });
});

describe('noIndentPrefix', () => {
  it('gives the format markup as a raw inline', () => {
    expect(noIndentPrefix('latex')).toBe('`\\noindent{}`{=latex}');
    expect(noIndentPrefix('revealjs')).toBe('`<p class="noindent">`{=html}');
  });

  it('is empty for docx and null for markdown', () => {
    expect(noIndentPrefix('docx')).toBe('');
    expect(noIndentPrefix('markdown')).toBeNull();
  });
});

describe('requiredLatexPackages', () => {
  it('asks for mdframed after a box and xcolor for draft annotations', () => {
    const context = contextFor('latex', true);
    context.accumulator.boxUsed = true;
    expect(requiredLatexPackages('latex', context.settings, context.accumulator)).toEqual([
      'mdframed',
      'xcolor',
    ]);
  });

  it('needs nothing in print mode without boxes', () => {
    const context = contextFor('latex');
    expect(requiredLatexPackages('latex', context.settings, context.accumulator)).toEqual([]);
  });

  it('ignores a draft highlight', () => {
    const settings = resolveAnnotationSettings(false, { highlight: 'draft' });
    expect(requiredLatexPackages('latex', settings, createAccumulator())).toEqual([]);
  });

  it('needs nothing outside LaTeX', () => {
    const context = contextFor('html', true);
    expect(requiredLatexPackages('html', context.settings, context.accumulator)).toEqual([]);
  });
});
