import { describe, it, expect } from 'vitest';
import { normalizeToken, rewriteLongOnly } from './normalizer';
import { ScanState } from './scan-state';
import { parseOptionSpecs } from './spec-parser';

describe('rewriteLongOnly', () => {
  it('should rewrite any single prefix to a double dash', () => {
    const specs = parseOptionSpecs('', ['all']);

    expect(rewriteLongOnly('-all', specs)).toBe('--all');
    expect(rewriteLongOnly('/all', specs)).toBe('--all');
    expect(rewriteLongOnly('+all', specs)).toBe('--all');
  });

  it('should revert to the short form when only a short option fits', () => {
    const specs = parseOptionSpecs('x', ['all']);

    expect(rewriteLongOnly('-xy', specs)).toBe('-xy');
  });

  it('should keep the long form when neither fits', () => {
    const specs = parseOptionSpecs('x', ['all']);

    expect(rewriteLongOnly('-yes', specs)).toBe('--yes');
  });

  it('should leave non-short tokens untouched', () => {
    const specs = parseOptionSpecs('', ['all']);

    expect(rewriteLongOnly('--all', specs)).toBe('--all');
    expect(rewriteLongOnly('word', specs)).toBe('word');
  });
});

describe('normalizeToken', () => {
  it('should advance past a consumed -W name', () => {
    const specs = parseOptionSpecs('W;', ['foo']);
    const state = new ScanState(['-W', 'foo', 'bar']);

    expect(normalizeToken('-W', specs, false, state)).toEqual({ text: '--foo' });
    expect(state.index).toBe(1);
  });

  it('should leave tokens alone without long options', () => {
    const specs = parseOptionSpecs('W;a');
    const state = new ScanState(['-W', 'foo']);

    expect(normalizeToken('-W', specs, true, state)).toEqual({ text: '-W' });
    expect(state.index).toBe(0);
  });
});
