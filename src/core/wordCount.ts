/**
 * Word counting over the rewritten document
 *
 * Counts what a reader sees: prose and captions, footnotes separately, and
 * the `abstract` metadata field. Code, raw markup, URLs and attribute blocks
 * are not words.
 */

import { findCodeBlocks } from './fences';
import type { Metadata } from './frontMatter';

export interface WordCount {
  /** Body + notes + abstract */
  words: number;
  abstract: number;
  notes: number;
  /** Main text without footnotes */
  body: number;
}

/**
 * A token is a word when it holds anything besides punctuation and symbols
 */
export function isWord(token: string): boolean {
  return /[^\p{P}\p{S}]/u.test(token);
}

function countTokens(text: string): number {
  return text.split(/\s+/).filter((token) => token && isWord(token)).length;
}

/**
 * Remove inline footnotes (`^[...]`, brackets may nest) and return them separately
 */
export function extractInlineNotes(text: string): { text: string; notes: string[] } {
  const notes: string[] = [];
  let result = '';
  let i = 0;

  while (i < text.length) {
    if (text[i] === '^' && text[i + 1] === '[') {
      let depth = 0;
      let end = -1;
      for (let j = i + 1; j < text.length; j++) {
        if (text[j] === '[') depth++;
        else if (text[j] === ']') {
          depth--;
          if (depth === 0) {
            end = j;
            break;
          }
        }
      }
      if (end > 0) {
        notes.push(text.slice(i + 2, end));
        i = end + 1;
        continue;
      }
    }
    result += text[i];
    i++;
  }

  return { text: result, notes };
}

/**
 * Reduce Markdown to its visible words
 */
export function visibleText(markdown: string): string {
  return (
    markdown
      // raw inlines and inline code
      .replace(/(`+)[\s\S]*?\1(\{=[\w-]+\})?/g, ' ')
      // images and links keep their text, lose their target
      .replace(/!?\[([^\]]*)\]\([^)]*\)/g, '$1')
      // attribute blocks and footnote references
      .replace(/\{[^}]*\}/g, ' ')
      .replace(/\[\^[^\]]+\]/g, ' ')
      // HTML tags
      .replace(/<[^>\n]+>/g, ' ')
      // fenced div markers and list/heading prefixes
      .replace(/^\s*:{3,}.*$/gm, ' ')
      .replace(/^\s*(?:#{1,6}|[-*+]|\d+[.)]|>)\s+/gm, '')
  );
}

/**
 * Split body text into main text and footnote definitions
 * (`[^id]: text` plus its indented continuation lines)
 */
function separateNoteDefinitions(lines: string[]): { body: string[]; notes: string[] } {
  const body: string[] = [];
  const notes: string[] = [];
  let inNote = false;

  for (const line of lines) {
    const definition = line.match(/^\[\^[^\]]+\]:\s?(.*)$/);
    if (definition) {
      inNote = true;
      notes.push(definition[1]);
    } else if (inNote && (/^( {4}|\t)/.test(line) || line.trim() === '')) {
      notes.push(line);
    } else {
      inNote = false;
      body.push(line);
    }
  }

  return { body, notes };
}

/**
 * Count words in a Markdown body and its metadata
 */
export function countWords(markdown: string, metadata: Metadata = {}): WordCount {
  const { codeLines } = findCodeBlocks(markdown);
  const lines = markdown.split('\n').filter((_, index) => !codeLines.has(index));
  const separated = separateNoteDefinitions(lines);

  const inline = extractInlineNotes(separated.body.join('\n'));
  const body = countTokens(visibleText(inline.text));
  const notes = [...separated.notes, ...inline.notes].reduce(
    (sum, note) => sum + countTokens(visibleText(note)),
    0,
  );

  const abstractText = typeof metadata.abstract === 'string' ? metadata.abstract : '';
  const abstract = countTokens(visibleText(abstractText));

  return { words: body + notes + abstract, abstract, notes, body };
}

export function formatWordCount(count: WordCount): string {
  return (
    `Words: ${count.words} │ Abstract: ${count.abstract} │ ` +
    `Notes: ${count.notes} │ Body: ${count.body}`
  );
}
