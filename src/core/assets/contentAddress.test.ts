import { describe, it, expect } from 'vitest';
import { addressOf } from './contentAddress';

describe('addressOf', () => {
  it('is the SHA-1 hex digest of payload followed by auxiliary', () => {
    expect(addressOf('abc', '')).toBe('a9993e364706816aba3e25717850c26c9cd0d89d');
    expect(addressOf('ab', 'c')).toBe('a9993e364706816aba3e25717850c26c9cd0d89d');
  });

  it('hashes the empty input', () => {
    expect(addressOf('', '')).toBe('da39a3ee5e6b4b0d3255bfef95601890afd80709');
  });

  it('is deterministic', () => {
    const payload = 'digraph { a -> b }';
    expect(addressOf(payload, '')).toBe(addressOf(payload, ''));
  });

  it('changes when one byte of the payload changes', () => {
    expect(addressOf('digraph { a -> b }', '')).not.toBe(addressOf('digraph { a -> c }', ''));
  });

  it('changes when the font changes', () => {
    const tikz = '\\draw (0,0) -- (1,1);';
    expect(addressOf(tikz, 'fbb')).not.toBe(addressOf(tikz, 'libertine'));
  });
});
