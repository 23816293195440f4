/**
 * Code block discovery and pandoc attribute syntax
 *
 * markdown-it finds fenced and indented code blocks, so the line-based
 * rewriting passes know which lines are code and must be left alone.
 */

import MarkdownIt from 'markdown-it';

/**
 * pandoc attributes: `{#id .class key="value"}`
 */
export interface PandocAttributes {
  id: string;
  classes: string[];
  /** Key/value pairs in source order */
  attributes: Array<[string, string]>;
}

export function emptyAttributes(): PandocAttributes {
  return { id: '', classes: [], attributes: [] };
}

/**
 * Tokenize an attribute list on whitespace, keeping quoted values intact.
 * A backslash inside quotes escapes the next character.
 *
 * @example
 * tokenizeAttributes(`.tikz caption='A "big" one' title="x y"`)
 * // => ['.tikz', `caption='A "big" one'`, 'title="x y"']
 */
export function tokenizeAttributes(input: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inQuote: string | null = null; // null, '"', or "'"

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (inQuote && char === '\\' && i + 1 < input.length) {
      current += char + input[i + 1];
      i++;
    } else if ((char === '"' || char === "'") && !inQuote) {
      inQuote = char;
      current += char;
    } else if (char === inQuote) {
      inQuote = null;
      current += char;
    } else if (/\s/.test(char) && !inQuote) {
      if (current) tokens.push(current);
      current = '';
    } else {
      current += char;
    }
  }

  if (current) tokens.push(current);

  return tokens;
}

function unquote(value: string): string {
  const quote = value[0];
  if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
    return value.slice(1, -1).replace(/\\(.)/g, '$1');
  }
  return value;
}

/**
 * Parse the contents of a `{...}` attribute block (braces optional)
 */
export function parsePandocAttributes(input: string): PandocAttributes {
  const trimmed = input.trim().replace(/^\{/, '').replace(/\}$/, '');
  const result = emptyAttributes();

  for (const token of tokenizeAttributes(trimmed)) {
    if (token.startsWith('#')) {
      result.id = token.slice(1);
    } else if (token.startsWith('.')) {
      result.classes.push(token.slice(1));
    } else {
      const eq = token.indexOf('=');
      if (eq > 0) {
        result.attributes.push([token.slice(0, eq), unquote(token.slice(eq + 1))]);
      }
    }
  }

  return result;
}

/**
 * Parse a code fence info string: a bare language (`dot`), an attribute
 * block (`{.dot}`) or both (`dot {#id}`)
 */
export function parseFenceInfo(info: string): PandocAttributes {
  const trimmed = info.trim();
  if (trimmed.startsWith('{')) {
    return parsePandocAttributes(trimmed);
  }

  const match = trimmed.match(/^(\S+)\s*(\{.*\})?\s*$/);
  if (!match) return emptyAttributes();
  const attributes = match[2] ? parsePandocAttributes(match[2]) : emptyAttributes();
  attributes.classes.unshift(match[1]);
  return attributes;
}

export function attributeValue(attrs: PandocAttributes, key: string): string | undefined {
  return attrs.attributes.find(([name]) => name === key)?.[1];
}

/**
 * Render attributes back to pandoc syntax; empty attributes give ''
 */
export function formatPandocAttributes(attrs: PandocAttributes): string {
  const parts: string[] = [];
  if (attrs.id) parts.push(`#${attrs.id}`);
  for (const cls of attrs.classes) parts.push(`.${cls}`);
  for (const [key, value] of attrs.attributes) {
    parts.push(`${key}="${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`);
  }
  return parts.length > 0 ? `{${parts.join(' ')}}` : '';
}

/**
 * One fenced code block, located by line
 */
export interface FencedBlock {
  /** First line (the opening fence), 0-based */
  startLine: number;
  /** Line after the closing fence */
  endLine: number;
  /** Nesting depth; 0 for blocks outside lists and block quotes */
  level: number;
  info: string;
  content: string;
  attributes: PandocAttributes;
}

export interface CodeLayout {
  fences: FencedBlock[];
  /** 0-based line numbers inside any fenced or indented code block */
  codeLines: Set<number>;
}

const md = new MarkdownIt('commonmark');

/**
 * Locate every code block in a Markdown body
 */
export function findCodeBlocks(markdown: string): CodeLayout {
  const tokens = md.parse(markdown, {});
  const fences: FencedBlock[] = [];
  const codeLines = new Set<number>();

  for (const token of tokens) {
    if ((token.type !== 'fence' && token.type !== 'code_block') || !token.map) {
      continue;
    }
    const [startLine, endLine] = token.map;
    for (let line = startLine; line < endLine; line++) {
      codeLines.add(line);
    }
    if (token.type === 'fence') {
      fences.push({
        startLine,
        endLine,
        level: token.level,
        info: token.info,
        content: token.content,
        attributes: parseFenceInfo(token.info),
      });
    }
  }

  return { fences, codeLines };
}
