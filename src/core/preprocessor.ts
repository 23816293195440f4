/**
 * Markdown preprocessor for md-annotate
 *
 * Runs BEFORE pandoc. Each pass rewrites the Markdown body as text, in this
 * order:
 * 1. transclusion of `@[label](file)` paragraphs
 * 2. non-indented paragraphs (`< ` prefix)
 * 3. TikZ / Graphviz code blocks -> generated figures
 * 4. comment / box / center fenced divs
 * 5. images (mirrored and converted), then annotation and cross-reference spans
 *
 * Replaced text is swapped for placeholder tokens as it is produced, so later
 * passes never rewrite generated markup. The tokens are expanded at the end.
 */

import { readFile } from 'fs/promises';
import { isAbsolute, resolve as resolvePath } from 'path';
import {
  blockAction,
  createAccumulator,
  noIndentPrefix,
  renderInline,
  requiredLatexPackages,
  resolveAnnotationSettings,
  toBlockKind,
  toInlineKind,
  type AnnotationContext,
  type AnnotationSettings,
  type DocumentAccumulator,
} from './annotations';
import { AssetResolver } from './assets/resolver';
import type { KeyedLock } from './assets/keyedLock';
import type { ToolInvoker } from './assets/tools';
import { applyMetadata, type FilterConfig } from './config';
import {
  attributeValue,
  findCodeBlocks,
  formatPandocAttributes,
  parsePandocAttributes,
  type FencedBlock,
  type PandocAttributes,
} from './fences';
import { codeSpan, rawInline } from './formats';
import {
  appendHeaderIncludes,
  serializeFrontMatter,
  splitFrontMatter,
  type Metadata,
} from './frontMatter';
import {
  describeImageReference,
  imageFormatFor,
  type Logger,
  type ResolutionError,
  type ResolutionErrorKind,
  type ResolutionResult,
  type SourceDescriptor,
} from './types';
import { countWords, formatWordCount, type WordCount } from './wordCount';

/**
 * Preprocessor context
 */
export interface PreprocessorContext {
  config: FilterConfig;
  tools: ToolInvoker;
  /** Directory of the Markdown file; relative references resolve from here */
  fileDir: string;
  /** Expansion of a leading `~/` in image references. Default: os.homedir() */
  homeDir?: string;
  logger?: Logger;
  /** Share one lock between documents converted concurrently */
  lock?: KeyedLock;
}

export interface PreprocessResult {
  markdown: string;
  /** Metadata as rewritten (header-includes added where needed) */
  metadata: Metadata;
  /** Effective config after the document's front matter was applied */
  config: FilterConfig;
  errors: ResolutionError[];
  wordCount: WordCount;
}

/**
 * Placeholder tokens for text that later passes must not touch
 */
export class Masker {
  private values: string[] = [];

  mask(text: string): string {
    const index = this.values.push(text) - 1;
    return `\uE000${index}\uE001`;
  }

  /** Expand every token, including tokens inside masked values */
  unmask(text: string): string {
    let result = text;
    let previous: string;
    do {
      previous = result;
      result = result.replace(/\uE000(\d+)\uE001/g, (_, index: string) => this.values[Number(index)] ?? '');
    } while (result !== previous);
    return result;
  }
}

const ERROR_VERBS: Record<ResolutionErrorKind, string> = {
  SourceNotFound: 'Cannot find',
  DownloadFailed: 'Could not download',
  TypesetFailed: 'Could not typeset',
  ConvertFailed: 'Could not convert',
  CopyFailed: 'Could not copy',
};

/**
 * Visible in-document marker for a failed asset
 *
 * @example
 * errorMarker({ kind: 'SourceNotFound', resource: 'fig.png', message: '' })
 * // => '$\\Longrightarrow$ ERROR: Cannot find `fig.png`! $\\Longleftarrow$'
 */
export function errorMarker(error: ResolutionError): string {
  return `$\\Longrightarrow$ ERROR: ${ERROR_VERBS[error.kind]} ${codeSpan(error.resource)}! $\\Longleftarrow$`;
}

/**
 * Plain text of inline Markdown, as pandoc would stringify it
 */
export function plainText(markdown: string): string {
  return markdown
    .replace(/(`+)([\s\S]*?)\1(\{[^}]*\})?/g, (_, _fence: string, code: string, attr: string | undefined) =>
      attr?.startsWith('{=') ? '' : code.trim(),
    )
    .replace(/!?\[([^\]]*)\]\([^)]*\)/g, '$1')
    .replace(/\*+|(^|\W)_+|_+(?=\W|$)/g, '$1')
    .replace(/\s+/g, ' ')
    .trim();
}

function isBlank(line: string | undefined): boolean {
  return line === undefined || line.trim() === '';
}

/**
 * Replace line ranges, last first so earlier ranges keep their positions
 */
function replaceLineRanges(
  lines: string[],
  ranges: Array<{ start: number; end: number; replacement: string[] }>,
): string[] {
  const result = [...lines];
  const ordered = [...ranges].sort((a, b) => b.start - a.start);
  for (const range of ordered) {
    result.splice(range.start, range.end - range.start, ...range.replacement);
  }
  return result;
}

/**
 * Replace regex matches with precomputed strings (reverse order to preserve indices)
 */
function replaceMatches(text: string, matches: RegExpMatchArray[], replacements: string[]): string {
  let result = text;
  for (let i = matches.length - 1; i >= 0; i--) {
    const match = matches[i];
    const matchIndex = match.index;
    if (matchIndex === undefined) continue;
    result =
      result.substring(0, matchIndex) +
      replacements[i] +
      result.substring(matchIndex + match[0].length);
  }
  return result;
}

/**
 * Transclusion paragraph: `@[label](file)` alone between blank lines
 */
const TRANSCLUSION_REGEX = /^@\[[^\]]*\]\(([^)\s]+)\)\s*$/;

/**
 * Replace transclusion paragraphs with the named file's body
 */
export async function preprocessTransclusions(
  markdown: string,
  fileDir: string,
  accumulator: DocumentAccumulator,
  logger: Logger,
): Promise<string> {
  const lines = markdown.split('\n');
  const { codeLines } = findCodeBlocks(markdown);

  const targets = lines
    .map((line, index) => ({ index, match: line.match(TRANSCLUSION_REGEX) }))
    .filter(
      ({ index, match }) =>
        match !== null &&
        !codeLines.has(index) &&
        isBlank(lines[index - 1]) &&
        isBlank(lines[index + 1]),
    );

  if (targets.length === 0) {
    return markdown;
  }

  const replacements = await Promise.all(
    targets.map(async ({ index, match }) => {
      const reference = match?.[1] ?? '';
      const path = isAbsolute(reference) ? reference : resolvePath(fileDir, reference);
      let replacement: string;
      try {
        const content = await readFile(path, 'utf-8');
        replacement = splitFrontMatter(content.replace(/\r\n/g, '\n')).body.replace(/\n+$/, '');
      } catch {
        logger.error(`ERROR: Cannot find ${reference}!`);
        const error: ResolutionError = {
          kind: 'SourceNotFound',
          resource: reference,
          message: `Cannot find ${reference}.`,
        };
        accumulator.errors.push(error);
        replacement = errorMarker(error);
      }
      return { start: index, end: index + 1, replacement: replacement.split('\n') };
    }),
  );

  return replaceLineRanges(lines, replacements).join('\n');
}

/**
 * Swap the `< ` that opens a paragraph for the format's no-indent markup
 */
export function preprocessNoIndent(markdown: string, prefix: string): string {
  const lines = markdown.split('\n');
  const { codeLines } = findCodeBlocks(markdown);

  return lines
    .map((line, index) => {
      if (codeLines.has(index) || !line.startsWith('< ') || !isBlank(lines[index - 1])) {
        return line;
      }
      return prefix + line.slice(2);
    })
    .join('\n');
}

/**
 * Pandoc treats an image as a figure only when its title starts with `fig:`
 */
function figureTitle(title: string): string {
  return title.startsWith('fig:') ? title : `fig:${title}`;
}

function linkTarget(path: string): string {
  return /[\s()<>]/.test(path) ? `<${path}>` : path;
}

function quoteTitle(title: string): string {
  return `"${title.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Markdown figure for a generated diagram
 */
export function figureMarkdown(path: string, attributes: PandocAttributes): string {
  const caption = attributeValue(attributes, 'caption') ?? '';
  const title = figureTitle(attributeValue(attributes, 'title') ?? '');
  return `![${caption}](${linkTarget(path)} ${quoteTitle(title)})${formatPandocAttributes(attributes)}`;
}

function diagramDescriptor(fence: FencedBlock): SourceDescriptor | null {
  const kind = fence.attributes.classes[0];
  if (kind !== 'tikz' && kind !== 'dot') return null;
  return {
    kind: kind === 'tikz' ? 'embedded-tikz' : 'embedded-dot',
    payload: fence.content.replace(/\n$/, ''),
    renderParams: {
      tikzLibrary: attributeValue(fence.attributes, 'tikzlibrary'),
      caption: attributeValue(fence.attributes, 'caption'),
      title: attributeValue(fence.attributes, 'title'),
    },
  };
}

function recordFailure(result: ResolutionResult, accumulator: DocumentAccumulator): string | null {
  if (result.ok) return null;
  accumulator.errors.push(result.error);
  return errorMarker(result.error);
}

/**
 * Replace top-level TikZ and Graphviz code blocks with generated figures
 *
 * Diagrams are resolved in parallel; each block becomes one masked line.
 */
export async function preprocessDiagrams(
  markdown: string,
  resolver: AssetResolver,
  config: FilterConfig,
  masker: Masker,
  accumulator: DocumentAccumulator,
): Promise<string> {
  const { fences } = findCodeBlocks(markdown);
  const diagrams = fences
    .filter((fence) => fence.level === 0)
    .map((fence) => ({ fence, descriptor: diagramDescriptor(fence) }))
    .flatMap(({ fence, descriptor }) => (descriptor ? [{ fence, descriptor }] : []));

  if (diagrams.length === 0) {
    return markdown;
  }

  const format = imageFormatFor(config.format);
  const results = await Promise.all(
    diagrams.map(({ descriptor }) => resolver.resolve(descriptor, format)),
  );

  const ranges = diagrams.map(({ fence }, i) => {
    const result = results[i];
    const replacement = recordFailure(result, accumulator) ??
      (result.ok ? figureMarkdown(result.path, fence.attributes) : '');
    return { start: fence.startLine, end: fence.endLine, replacement: [masker.mask(replacement)] };
  });

  return replaceLineRanges(markdown.split('\n'), ranges).join('\n');
}

const DIV_OPEN_REGEX = /^:{3,}\s*(\{[^}]*\}|[^\s:{}]+)\s*:*\s*$/;
const DIV_CLOSE_REGEX = /^:{3,}\s*$/;

interface DivNode {
  open: string;
  close: string;
  attributes: PandocAttributes;
  children: DivChild[];
}

type DivChild = string | DivNode;

function divAttributes(header: string): PandocAttributes {
  if (header.startsWith('{')) return parsePandocAttributes(header);
  return { id: '', classes: [header], attributes: [] };
}

/**
 * Nest fenced divs by their opening and closing fence lines.
 * An opening fence that is never closed stays as text.
 */
export function parseDivs(lines: string[], codeLines: Set<number>): DivChild[] {
  const root: DivChild[] = [];
  const stack: Array<{ open: string; attributes: PandocAttributes; children: DivChild[] }> = [];
  const current = (): DivChild[] => (stack.length > 0 ? stack[stack.length - 1].children : root);

  lines.forEach((line, index) => {
    if (codeLines.has(index)) {
      current().push(line);
      return;
    }
    const closing = DIV_CLOSE_REGEX.test(line);
    if (closing && stack.length > 0) {
      const frame = stack.pop();
      if (frame) {
        current().push({ open: frame.open, close: line, attributes: frame.attributes, children: frame.children });
      }
      return;
    }
    const opening = closing ? null : line.match(DIV_OPEN_REGEX);
    if (opening) {
      stack.push({ open: line, attributes: divAttributes(opening[1]), children: [] });
      return;
    }
    current().push(line);
  });

  // Unclosed divs are not divs
  while (stack.length > 0) {
    const frame = stack.pop();
    if (frame) current().push(frame.open, ...frame.children);
  }

  return root;
}

function renderDivs(children: DivChild[], context: AnnotationContext, masker: Masker): string[] {
  const lines: string[] = [];
  for (const child of children) {
    if (typeof child === 'string') {
      lines.push(child);
      continue;
    }

    const content = renderDivs(child.children, context, masker);
    const kind = toBlockKind(child.attributes.classes[0]);
    const action = kind ? blockAction(kind, context) : { type: 'keep' as const };

    switch (action.type) {
      case 'keep':
        lines.push(child.open, ...content, child.close);
        break;
      case 'remove':
        lines.push('');
        break;
      case 'unwrap':
        lines.push('', ...content, '');
        break;
      case 'wrap':
        lines.push('');
        if (action.open) lines.push(masker.mask(action.open), '');
        lines.push(...content, '');
        if (action.close) lines.push(masker.mask(action.close), '');
        break;
    }
  }
  return lines;
}

/**
 * Rewrite comment, box and center fenced divs, innermost first
 */
export function preprocessDivs(markdown: string, context: AnnotationContext, masker: Masker): string {
  const lines = markdown.split('\n');
  const { codeLines } = findCodeBlocks(markdown);
  return renderDivs(parseDivs(lines, codeLines), context, masker).join('\n');
}

/**
 * Code spans and raw inlines, with any attribute block
 */
const CODE_SPAN_REGEX = /(`+)(?!`)(?:(?!\n[ \t]*\n)[\s\S])*?[^`]\1(?!`)(?:\{[^}]*\})?/g;

/**
 * Inline image: ![alt](src "title")
 */
const IMAGE_REGEX =
  /!\[((?:[^[\]]|\[[^[\]]*\])*)\]\(\s*(<[^>\n]*>|[^\s)]+)(\s+(?:"[^"]*"|'[^']*'))?\s*\)/g;

/**
 * Bracketed span with attributes: [content]{.kind}
 */
const SPAN_REGEX = /(?<!!)\[([^[\]]*)\]\{([^}]*)\}/g;

/**
 * Runs of consecutive non-code lines; code lines pass through untouched
 */
function proseChunks(markdown: string): Array<{ text: string; prose: boolean }> {
  const lines = markdown.split('\n');
  const { codeLines } = findCodeBlocks(markdown);
  const chunks: Array<{ text: string; prose: boolean }> = [];
  let buffer: string[] = [];
  let prose = true;

  lines.forEach((line, index) => {
    const isProse = !codeLines.has(index);
    if (isProse !== prose && buffer.length > 0) {
      chunks.push({ text: buffer.join('\n'), prose });
      buffer = [];
    }
    prose = isProse;
    buffer.push(line);
  });
  chunks.push({ text: buffer.join('\n'), prose });

  return chunks;
}

function imageSource(target: string): string {
  return target.startsWith('<') && target.endsWith('>') ? target.slice(1, -1) : target;
}

/**
 * Mirror and convert every image reference in the given prose chunks
 */
export async function preprocessImages(
  chunks: string[],
  resolver: AssetResolver,
  config: FilterConfig,
  masker: Masker,
  accumulator: DocumentAccumulator,
): Promise<string[]> {
  const perChunk = chunks.map((chunk) =>
    [...chunk.matchAll(IMAGE_REGEX)].filter((match) => !imageSource(match[2]).startsWith('data:')),
  );
  const jobs = perChunk.flatMap((matches) => matches);

  if (jobs.length === 0) {
    return chunks;
  }

  // Resolve all images in parallel
  const format = imageFormatFor(config.format);
  const results = await Promise.all(
    jobs.map((match) => resolver.resolve(describeImageReference(imageSource(match[2])), format)),
  );

  let offset = 0;
  return chunks.map((chunk, chunkIndex) => {
    const matches = perChunk[chunkIndex];
    const replacements = matches.map((match, i) => {
      const result = results[offset + i];
      const failure = recordFailure(result, accumulator);
      if (failure) return masker.mask(failure);
      if (!result.ok || result.status === 'unprocessed') return masker.mask(match[0]);
      return masker.mask(`![${match[1]}](${linkTarget(result.path)}${match[3] ?? ''})`);
    });
    offset += matches.length;
    return replaceMatches(chunk, matches, replacements);
  });
}

/**
 * Rewrite annotation and cross-reference spans, innermost first.
 * Spans of other classes are kept as written.
 */
export function preprocessSpans(text: string, context: AnnotationContext, masker: Masker): string {
  let result = text;
  let matches = [...result.matchAll(SPAN_REGEX)];

  while (matches.length > 0) {
    const replacements = matches.map((match) => {
      const [whole, content, attrs] = match;
      const kind = toInlineKind(parsePandocAttributes(attrs).classes[0]);
      // a span never continues past a paragraph break
      if (!kind || /\n\s*\n/.test(content)) return masker.mask(whole);
      const rendered = renderInline(
        kind,
        { markdown: content, plain: plainText(masker.unmask(content)) },
        context,
      );
      return masker.mask(rendered ?? whole);
    });
    result = replaceMatches(result, matches, replacements);
    matches = [...result.matchAll(SPAN_REGEX)];
  }

  return result;
}

/**
 * Main preprocessing pipeline
 *
 * Transforms markdown before passing it to pandoc. Per-asset failures never
 * reject: they appear as error markers in the document and in `errors`.
 */
export async function preprocess(
  markdown: string,
  context: PreprocessorContext,
): Promise<PreprocessResult> {
  const logger = context.logger || console;
  const split = splitFrontMatter(markdown.replace(/\r\n/g, '\n'));
  if (split.error) {
    logger.warn(`Warning: ${split.error}`);
  }

  const config = applyMetadata(context.config, split.metadata);
  const settings: AnnotationSettings = resolveAnnotationSettings(
    config.annotations.draft,
    config.annotations,
  );
  const accumulator = createAccumulator();
  const annotationContext: AnnotationContext = { format: config.format, settings, accumulator };
  const masker = new Masker();
  const rewriting = config.format !== 'markdown';

  const resolver = new AssetResolver({
    assetDir: config.assets.dir,
    tools: context.tools,
    fontFamily: config.assets.fontFamily,
    processImages: config.assets.processImages,
    baseDir: context.fileDir,
    homeDir: context.homeDir,
    logger,
    lock: context.lock,
  });

  let body = split.body;

  // 1. @[label](file) -> file contents
  if (rewriting) {
    body = await preprocessTransclusions(body, context.fileDir, accumulator, logger);
  }

  // 2. "< " paragraphs -> no-indent markup
  const prefix = noIndentPrefix(config.format);
  if (prefix !== null) {
    body = preprocessNoIndent(body, prefix);
  }

  // 3. tikz / dot code blocks -> figures
  body = await preprocessDiagrams(body, resolver, config, masker, accumulator);

  // 4. ::: comment / box / center
  if (rewriting) {
    body = preprocessDivs(body, annotationContext, masker);
  }

  // 5. images, then spans, outside of code
  const chunks = proseChunks(body);
  const prose = chunks.map((chunk) =>
    chunk.prose ? chunk.text.replace(CODE_SPAN_REGEX, (code) => masker.mask(code)) : chunk.text,
  );
  const proseIndexes = chunks.flatMap((chunk, index) => (chunk.prose ? [index] : []));
  const withImages = await preprocessImages(
    proseIndexes.map((index) => prose[index]),
    resolver,
    config,
    masker,
    accumulator,
  );
  proseIndexes.forEach((chunkIndex, i) => {
    prose[chunkIndex] = rewriting
      ? preprocessSpans(withImages[i], annotationContext, masker)
      : withImages[i];
  });
  body = masker.unmask(prose.join('\n'));

  // 6. word count
  const wordCount = countWords(body, split.metadata);
  if (config.wordCount) {
    logger.log(formatWordCount(wordCount));
  }

  // 7. header-includes for packages the rewritten body relies on
  let metadata = split.metadata;
  let frontMatter = split.raw;
  const packages = requiredLatexPackages(config.format, settings, accumulator);
  if (packages.length > 0 && !split.error) {
    metadata = appendHeaderIncludes(
      metadata,
      packages.map((name) => rawInline(`\\RequirePackage{${name}}`, 'latex')),
    );
    frontMatter = serializeFrontMatter(metadata);
  }

  return {
    markdown: frontMatter + body,
    metadata,
    config,
    errors: accumulator.errors,
    wordCount,
  };
}
