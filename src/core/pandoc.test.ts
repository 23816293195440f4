import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { CommandError, type CommandRunner } from './assets/tools';
import { FilterError } from './errors';
import { buildPandocArgs, defaultOutputPath, runPandoc } from './pandoc';

describe('defaultOutputPath', () => {
  const input = join('/docs', 'chapter.md');

  it('picks the extension from the format', () => {
    expect(defaultOutputPath(input, 'latex')).toBe(join('/docs', 'chapter.pdf'));
    expect(defaultOutputPath(input, 'beamer')).toBe(join('/docs', 'chapter.pdf'));
    expect(defaultOutputPath(input, 'html5')).toBe(join('/docs', 'chapter.html'));
    expect(defaultOutputPath(input, 'revealjs')).toBe(join('/docs', 'chapter.html'));
    expect(defaultOutputPath(input, 'docx')).toBe(join('/docs', 'chapter.docx'));
  });

  it('does not overwrite the input for markdown output', () => {
    expect(defaultOutputPath(input, 'markdown')).toBe(join('/docs', 'chapter.annotated.md'));
  });
});

describe('buildPandocArgs', () => {
  it('builds the minimal argument list', () => {
    expect(buildPandocArgs('/tmp/in.md', { format: 'latex', outputPath: 'out.pdf' })).toEqual([
      '-f',
      'markdown',
      '-t',
      'latex',
      '-o',
      'out.pdf',
      '/tmp/in.md',
    ]);
  });

  it('adds the resource path and extra arguments before the input', () => {
    expect(
      buildPandocArgs('/tmp/in.md', {
        format: 'html5',
        outputPath: 'out.html',
        resourcePath: '/docs',
        additionalArgs: ['--toc', '--standalone'],
      }),
    ).toEqual([
      '-f',
      'markdown',
      '-t',
      'html5',
      '-o',
      'out.html',
      '--resource-path=/docs',
      '--toc',
      '--standalone',
      '/tmp/in.md',
    ]);
  });
});

describe('runPandoc', () => {
  it('runs pandoc with the given arguments', async () => {
    const calls: Array<[string, string[]]> = [];
    const runner: CommandRunner = {
      async run(command, args) {
        calls.push([command, args]);
      },
    };

    await runPandoc(runner, '/usr/bin/pandoc', ['-t', 'latex', 'in.md']);

    expect(calls).toEqual([['/usr/bin/pandoc', ['-t', 'latex', 'in.md']]]);
  });

  it('passes on the exit code of a failing run', async () => {
    const runner: CommandRunner = {
      async run() {
        throw new CommandError('Unknown writer: pdf', 64);
      },
    };

    const failure = await runPandoc(runner, 'pandoc', []).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(FilterError);
    if (failure instanceof FilterError) {
      expect(failure.code).toBe('PANDOC_FAILED');
      expect(failure.message).toBe('pandoc failed: Unknown writer: pdf');
      expect(failure.exitCode).toBe(64);
    }
  });

  it('exits with 1 when pandoc could not be started', async () => {
    const runner: CommandRunner = {
      async run() {
        throw new CommandError('spawn pandoc ENOENT', null);
      },
    };

    const failure = await runPandoc(runner, 'pandoc', []).catch((error: unknown) => error);

    expect(failure instanceof FilterError && failure.exitCode).toBe(1);
  });
});
