/**
 * Configuration for md-annotate
 *
 * Precedence, lowest first: defaults, config file, CLI flags, document front matter.
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { isVisibility, type AnnotationSettings, type Visibility } from './annotations';
import { DEFAULT_FONT } from './assets/resolver';
import { FilterError } from './errors';
import { isRecord, type Metadata } from './frontMatter';
import { isOutputFormat, type OutputFormat } from './types';

export interface FilterConfig {
  // Target pandoc writer
  format: OutputFormat;

  // Annotation display; unset kinds follow `draft`
  annotations: {
    draft: boolean;
  } & Partial<AnnotationSettings>;

  // Generated and mirrored images
  assets: {
    dir: string; // Managed asset directory
    processImages: boolean; // false: leave image references untouched
    fontFamily: string; // LaTeX font package for TikZ figures
    density: number; // convert -density
    quality: number; // convert -quality
  };

  // External tool executables
  tools: {
    pdflatex: string;
    dot: string;
    convert: string;
    pandoc: string;
    timeout?: number; // ms per tool run; unset waits indefinitely
  };

  // Print the word count summary after preprocessing
  wordCount: boolean;

  // pandoc pass-through (additional args beyond the defaults)
  pandocArgs?: string[];
}

export const DEFAULT_ASSET_DIR = join(homedir(), 'tmp', 'pandoc', 'Figures');

export const DEFAULT_CONFIG: FilterConfig = {
  format: 'latex',
  annotations: {
    draft: false,
  },
  assets: {
    dir: DEFAULT_ASSET_DIR,
    processImages: true,
    fontFamily: DEFAULT_FONT,
    density: 300,
    quality: 100,
  },
  tools: {
    pdflatex: 'pdflatex',
    dot: 'dot',
    convert: 'convert',
    pandoc: 'pandoc',
  },
  wordCount: true,
};

/**
 * Config file contents after validation; every field optional
 */
export interface PartialFilterConfig {
  format?: OutputFormat;
  annotations?: Partial<FilterConfig['annotations']>;
  assets?: Partial<FilterConfig['assets']>;
  tools?: Partial<FilterConfig['tools']>;
  wordCount?: boolean;
  pandocArgs?: string[];
}

/**
 * Fresh copy of the defaults; nested objects are not shared
 */
export function defaultConfig(): FilterConfig {
  return mergeConfig(DEFAULT_CONFIG, {});
}

/**
 * Merge a partial config over a complete one
 */
export function mergeConfig(base: FilterConfig, override: PartialFilterConfig): FilterConfig {
  return {
    format: override.format ?? base.format,
    annotations: { ...base.annotations, ...definedOnly(override.annotations) },
    assets: { ...base.assets, ...definedOnly(override.assets) },
    tools: { ...base.tools, ...definedOnly(override.tools) },
    wordCount: override.wordCount ?? base.wordCount,
    pandocArgs: override.pandocArgs ?? base.pandocArgs,
  };
}

function definedOnly<T extends object>(value: T | undefined): Partial<T> {
  if (!value) return {};
  const result: Partial<T> = {};
  for (const key in value) {
    if (value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

function invalid(path: string, expected: string): FilterError {
  return new FilterError('INVALID_CONFIG', `Invalid config value for ${path}: expected ${expected}`);
}

function optionalString(section: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw invalid(`${path}.${key}`, 'a string');
  return value;
}

function optionalBoolean(section: Record<string, unknown>, key: string, path: string): boolean | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') throw invalid(`${path}.${key}`, 'true or false');
  return value;
}

function optionalNumber(section: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw invalid(`${path}.${key}`, 'a positive number');
  }
  return value;
}

function optionalVisibility(section: Record<string, unknown>, key: string, path: string): Visibility | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (!isVisibility(value)) throw invalid(`${path}.${key}`, 'draft, print or hide');
  return value;
}

function optionalSection(root: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = root[key];
  if (value === undefined) return {};
  if (!isRecord(value)) throw invalid(key, 'an object');
  return value;
}

/**
 * Validate parsed config file contents
 */
export function parseConfig(value: unknown): PartialFilterConfig {
  if (!isRecord(value)) throw invalid('config', 'an object');

  const config: PartialFilterConfig = {};

  const format = optionalString(value, 'format', 'config');
  if (format !== undefined) {
    if (!isOutputFormat(format)) {
      throw new FilterError('INVALID_FORMAT', `Unsupported output format: ${format}`);
    }
    config.format = format;
  }

  const annotations = optionalSection(value, 'annotations');
  config.annotations = {
    draft: optionalBoolean(annotations, 'draft', 'annotations'),
    comment: optionalVisibility(annotations, 'comment', 'annotations'),
    margin: optionalVisibility(annotations, 'margin', 'annotations'),
    fixme: optionalVisibility(annotations, 'fixme', 'annotations'),
    highlight: optionalVisibility(annotations, 'highlight', 'annotations'),
  };

  const assets = optionalSection(value, 'assets');
  config.assets = {
    dir: optionalString(assets, 'dir', 'assets'),
    processImages: optionalBoolean(assets, 'processImages', 'assets'),
    fontFamily: optionalString(assets, 'fontFamily', 'assets'),
    density: optionalNumber(assets, 'density', 'assets'),
    quality: optionalNumber(assets, 'quality', 'assets'),
  };

  const tools = optionalSection(value, 'tools');
  config.tools = {
    pdflatex: optionalString(tools, 'pdflatex', 'tools'),
    dot: optionalString(tools, 'dot', 'tools'),
    convert: optionalString(tools, 'convert', 'tools'),
    pandoc: optionalString(tools, 'pandoc', 'tools'),
    timeout: optionalNumber(tools, 'timeout', 'tools'),
  };

  config.wordCount = optionalBoolean(value, 'wordCount', 'config');

  const pandocArgs = value.pandocArgs;
  if (pandocArgs !== undefined) {
    if (!Array.isArray(pandocArgs) || !pandocArgs.every((arg) => typeof arg === 'string')) {
      throw invalid('pandocArgs', 'a list of strings');
    }
    config.pandocArgs = pandocArgs.filter((arg): arg is string => typeof arg === 'string');
  }

  return config;
}

export const CONFIG_FILE_NAMES = [
  'md-annotate.config.json',
  '.md-annotate.json',
  'md-annotate.json',
];

/**
 * Load config from file, merging with defaults
 */
export function loadConfig(configPath?: string, searchDir = process.cwd()): FilterConfig {
  let configFile: string | undefined;

  if (configPath) {
    configFile = configPath;
  } else {
    // Try default paths
    for (const name of CONFIG_FILE_NAMES) {
      const candidate = join(searchDir, name);
      if (existsSync(candidate)) {
        configFile = candidate;
        break;
      }
    }
  }

  if (!configFile || !existsSync(configFile)) {
    return defaultConfig();
  }

  try {
    const content = readFileSync(configFile, 'utf-8');
    return mergeConfig(DEFAULT_CONFIG, parseConfig(JSON.parse(content)));
  } catch (e) {
    console.warn(`Warning: Failed to load config from ${configFile}:`, e instanceof Error ? e.message : e);
    return defaultConfig();
  }
}

function metadataString(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

function metadataBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  const text = metadataString(value)?.toLowerCase();
  if (text === 'true' || text === 'yes' || text === 'on') return true;
  if (text === 'false' || text === 'no' || text === 'off') return false;
  return undefined;
}

/**
 * Overlay the document's own settings from its front matter
 *
 * Recognized keys: draft, comment, margin, fixme, highlight, processimage, fontfamily.
 * Unrecognized values are ignored.
 */
export function applyMetadata(config: FilterConfig, metadata: Metadata): FilterConfig {
  const annotations: Partial<FilterConfig['annotations']> = {
    draft: metadataBoolean(metadata.draft),
  };
  for (const kind of ['comment', 'margin', 'fixme', 'highlight'] as const) {
    const value = metadataString(metadata[kind]);
    if (isVisibility(value)) annotations[kind] = value;
  }

  const fontFamily = metadataString(metadata.fontfamily);

  return mergeConfig(config, {
    annotations,
    assets: {
      processImages: metadataBoolean(metadata.processimage),
      fontFamily: fontFamily || undefined,
    },
  });
}
