import { describe, it, expect } from 'vitest';
import * as yaml from 'js-yaml';
import { appendHeaderIncludes, serializeFrontMatter, splitFrontMatter } from './frontMatter';

describe('splitFrontMatter', () => {
  it('separates metadata from the body', () => {
    expect(splitFrontMatter('---\ntitle: Test\ndraft: true\n---\nBody\n')).toEqual({
      metadata: { title: 'Test', draft: true },
      raw: '---\ntitle: Test\ndraft: true\n---\n',
      body: 'Body\n',
    });
  });

  it('accepts ... as the closing delimiter', () => {
    const split = splitFrontMatter('---\ntitle: Test\n...\nBody');
    expect(split.metadata).toEqual({ title: 'Test' });
    expect(split.body).toBe('Body');
  });

  it('handles CRLF line endings', () => {
    const split = splitFrontMatter('---\r\ntitle: Test\r\n---\r\nBody');
    expect(split.metadata).toEqual({ title: 'Test' });
    expect(split.body).toBe('Body');
  });

  it('treats an empty block as empty metadata', () => {
    expect(splitFrontMatter('---\n---\nBody')).toEqual({ metadata: {}, raw: '---\n---\n', body: 'Body' });
  });

  it('returns the whole text as body without front matter', () => {
    expect(splitFrontMatter('# Heading\n\n---\n')).toEqual({ metadata: {}, raw: '', body: '# Heading\n\n---\n' });
  });

  it('ignores a dash line that does not start the document', () => {
    expect(splitFrontMatter('Intro\n---\ntitle: x\n---\n').raw).toBe('');
  });

  it('ignores YAML that is not a mapping', () => {
    expect(splitFrontMatter('---\n- a\n- b\n---\nBody').metadata).toEqual({});
  });

  it('reports unparsable YAML and keeps the block', () => {
    const split = splitFrontMatter('---\ntitle: [unclosed\n---\nBody');
    expect(split.metadata).toEqual({});
    expect(split.raw).toBe('---\ntitle: [unclosed\n---\n');
    expect(split.body).toBe('Body');
    expect(split.error).toMatch(/^Failed to parse front matter YAML: /);
  });
});

describe('serializeFrontMatter', () => {
  it('writes a YAML block', () => {
    expect(serializeFrontMatter({ title: 'Test' })).toBe('---\ntitle: Test\n---\n');
  });

  it('writes nothing for empty metadata', () => {
    expect(serializeFrontMatter({})).toBe('');
  });

  it('keeps raw LaTeX entries readable by pandoc', () => {
    const entry = '`\\RequirePackage{xcolor}`{=latex}';
    const block = serializeFrontMatter({ 'header-includes': [entry] });
    expect(splitFrontMatter(`${block}Body`).metadata).toEqual({ 'header-includes': [entry] });
    expect(yaml.load(block.slice(4, -4))).toEqual({ 'header-includes': [entry] });
  });
});

describe('appendHeaderIncludes', () => {
  it('creates the list when absent', () => {
    expect(appendHeaderIncludes({ title: 'T' }, ['a'])).toEqual({ title: 'T', 'header-includes': ['a'] });
  });

  it('turns a single value into a list', () => {
    expect(appendHeaderIncludes({ 'header-includes': 'old' }, ['a', 'b'])).toEqual({
      'header-includes': ['old', 'a', 'b'],
    });
  });

  it('appends to an existing list without changing it', () => {
    const metadata = { 'header-includes': ['old'] };
    expect(appendHeaderIncludes(metadata, ['a'])).toEqual({ 'header-includes': ['old', 'a'] });
    expect(metadata['header-includes']).toEqual(['old']);
  });

  it('returns the metadata untouched when there is nothing to add', () => {
    const metadata = { title: 'T' };
    expect(appendHeaderIncludes(metadata, [])).toBe(metadata);
  });
});
