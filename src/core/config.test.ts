import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DEFAULT_CONFIG,
  applyMetadata,
  defaultConfig,
  loadConfig,
  mergeConfig,
  parseConfig,
} from './config';
import { FilterError } from './errors';

describe('parseConfig', () => {
  it('accepts a partial config', () => {
    const parsed = parseConfig({ format: 'html5', assets: { density: 150 }, tools: { dot: '/opt/bin/dot' } });
    expect(parsed.format).toBe('html5');
    expect(parsed.assets?.density).toBe(150);
    expect(parsed.tools?.dot).toBe('/opt/bin/dot');
    expect(parsed.assets?.quality).toBeUndefined();
  });

  it('accepts annotation visibilities', () => {
    expect(parseConfig({ annotations: { draft: true, margin: 'print' } }).annotations).toEqual({
      draft: true,
      margin: 'print',
    });
  });

  it('rejects an unknown output format', () => {
    expect(() => parseConfig({ format: 'pdf' })).toThrow(FilterError);
    expect(() => parseConfig({ format: 'pdf' })).toThrow('Unsupported output format: pdf');
  });

  it('rejects values of the wrong type', () => {
    expect(() => parseConfig({ assets: { density: -1 } })).toThrow(
      'Invalid config value for assets.density: expected a positive number',
    );
    expect(() => parseConfig({ annotations: { comment: 'loud' } })).toThrow(
      'Invalid config value for annotations.comment: expected draft, print or hide',
    );
    expect(() => parseConfig({ tools: 'pdflatex' })).toThrow(
      'Invalid config value for tools: expected an object',
    );
    expect(() => parseConfig([])).toThrow('Invalid config value for config: expected an object');
  });

  it('validates pandoc arguments', () => {
    expect(parseConfig({ pandocArgs: ['--toc'] }).pandocArgs).toEqual(['--toc']);
    expect(() => parseConfig({ pandocArgs: [1] })).toThrow(
      'Invalid config value for pandocArgs: expected a list of strings',
    );
  });

  it('reports the error code', () => {
    try {
      parseConfig({ wordCount: 'yes' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FilterError);
      expect(error instanceof FilterError && error.code).toBe('INVALID_CONFIG');
    }
  });
});

describe('mergeConfig', () => {
  it('overrides only the given values', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, { assets: { fontFamily: 'libertine' }, wordCount: false });
    expect(merged.assets).toEqual({ ...DEFAULT_CONFIG.assets, fontFamily: 'libertine' });
    expect(merged.wordCount).toBe(false);
    expect(merged.format).toBe('latex');
  });

  it('ignores explicitly undefined values', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, { tools: { pandoc: undefined } });
    expect(merged.tools.pandoc).toBe('pandoc');
  });

  it('does not share nested objects with the defaults', () => {
    const config = defaultConfig();
    config.assets.density = 72;
    expect(DEFAULT_CONFIG.assets.density).toBe(300);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'config-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('finds a config file in the search directory', () => {
    writeFileSync(join(dir, 'md-annotate.config.json'), JSON.stringify({ format: 'docx' }));
    expect(loadConfig(undefined, dir).format).toBe('docx');
  });

  it('reads an explicit config path', () => {
    const file = join(dir, 'custom.json');
    writeFileSync(file, JSON.stringify({ annotations: { draft: true } }));
    expect(loadConfig(file, dir).annotations.draft).toBe(true);
  });

  it('returns the defaults without a config file', () => {
    expect(loadConfig(undefined, dir)).toEqual(DEFAULT_CONFIG);
    expect(loadConfig(join(dir, 'missing.json'), dir)).toEqual(DEFAULT_CONFIG);
  });

  it('warns and falls back to the defaults on a broken file', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const file = join(dir, '.md-annotate.json');
    writeFileSync(file, JSON.stringify({ format: 'pdf' }));

    expect(loadConfig(undefined, dir)).toEqual(DEFAULT_CONFIG);
    expect(warn).toHaveBeenCalledWith(
      `Warning: Failed to load config from ${file}:`,
      'Unsupported output format: pdf',
    );
  });
});

describe('applyMetadata', () => {
  it('applies the document settings', () => {
    const config = applyMetadata(defaultConfig(), {
      draft: 'yes',
      fixme: 'hide',
      processimage: false,
      fontfamily: 'libertine',
    });
    expect(config.annotations).toEqual({ draft: true, fixme: 'hide' });
    expect(config.assets.processImages).toBe(false);
    expect(config.assets.fontFamily).toBe('libertine');
  });

  it('lets the document override earlier settings', () => {
    const base = mergeConfig(DEFAULT_CONFIG, { annotations: { draft: true } });
    expect(applyMetadata(base, { draft: false }).annotations.draft).toBe(false);
  });

  it('ignores values it does not understand', () => {
    const config = applyMetadata(defaultConfig(), { draft: 'maybe', comment: 'loud', fontfamily: '' });
    expect(config.annotations).toEqual({ draft: false });
    expect(config.assets.fontFamily).toBe('fbb');
  });

  it('leaves the config alone without metadata', () => {
    expect(applyMetadata(defaultConfig(), {})).toEqual(DEFAULT_CONFIG);
  });
});
