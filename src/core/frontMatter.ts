/**
 * YAML front matter handling
 *
 * pandoc reads the leading `---` block as document metadata. The
 * preprocessor only needs a handful of keys from it and rewrites it only when
 * `header-includes` has to change.
 */

import * as yaml from 'js-yaml';

export type Metadata = Record<string, unknown>;

export interface FrontMatterSplit {
  /** Parsed metadata (empty if there is none or it could not be parsed) */
  metadata: Metadata;
  /** Front matter block exactly as written, delimiters included; '' if absent */
  raw: string;
  /** Everything after the front matter */
  body: string;
  /** YAML parse failure, if any */
  error?: string;
}

/**
 * Leading front matter block. Handles LF and CRLF line endings, and pandoc's
 * `...` as an alternative closing delimiter.
 */
const FRONT_MATTER_REGEX =
  /^---[ \t]*\r?\n(?:([\s\S]*?)\r?\n)?(?:---|\.\.\.)[ \t]*(?:\r?\n|$)/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Separate the front matter from the body of a Markdown document
 */
export function splitFrontMatter(markdown: string): FrontMatterSplit {
  const match = markdown.match(FRONT_MATTER_REGEX);
  if (!match) {
    return { metadata: {}, raw: '', body: markdown };
  }

  const raw = match[0];
  const body = markdown.slice(raw.length);

  try {
    const parsed = yaml.load(match[1] ?? '');
    return { metadata: isRecord(parsed) ? parsed : {}, raw, body };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      metadata: {},
      raw,
      body,
      error: `Failed to parse front matter YAML: ${message}`,
    };
  }
}

/**
 * Render metadata as a front matter block
 */
export function serializeFrontMatter(metadata: Metadata): string {
  if (Object.keys(metadata).length === 0) return '';
  return `---\n${yaml.dump(metadata, { lineWidth: -1 })}---\n`;
}

/**
 * Copy of `metadata` with `entries` appended to `header-includes`,
 * whether that key is absent, a single value or a list
 */
export function appendHeaderIncludes(metadata: Metadata, entries: string[]): Metadata {
  if (entries.length === 0) return metadata;

  const existing = metadata['header-includes'];
  let includes: unknown[];
  if (existing === undefined || existing === null) {
    includes = [];
  } else if (Array.isArray(existing)) {
    includes = [...existing];
  } else {
    includes = [existing];
  }
  return { ...metadata, 'header-includes': [...includes, ...entries] };
}
