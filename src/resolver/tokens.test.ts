import { describe, it, expect } from 'vitest';
import { isLongForm, isShortForm, looksLikeOption, splitLongBody, toToken } from './tokens';

describe('toToken', () => {
  it('should tag strings as text and anything else as opaque', () => {
    expect(toToken('-a')).toEqual({ kind: 'text', value: '-a' });
    expect(toToken(3)).toEqual({ kind: 'opaque', value: 3 });
    expect(toToken(['-a'])).toEqual({ kind: 'opaque', value: ['-a'] });
  });
});

describe('isShortForm', () => {
  it('should accept one prefix followed by a non-prefix character', () => {
    expect(isShortForm('-a')).toBe(true);
    expect(isShortForm('/abc')).toBe(true);
    expect(isShortForm('+x')).toBe(true);
  });

  it('should reject bare prefixes, doubled prefixes and plain words', () => {
    expect(isShortForm('-')).toBe(false);
    expect(isShortForm('--')).toBe(false);
    expect(isShortForm('--all')).toBe(false);
    expect(isShortForm('-/x')).toBe(false);
    expect(isShortForm('word')).toBe(false);
  });
});

describe('isLongForm', () => {
  it('should accept a doubled prefix followed by a name', () => {
    expect(isLongForm('--all')).toBe(true);
    expect(isLongForm('--file=a')).toBe(true);
    expect(isLongForm('//all')).toBe(true);
    expect(isLongForm('++all')).toBe(true);
  });

  it('should reject the terminator and malformed prefixes', () => {
    expect(isLongForm('--')).toBe(false);
    expect(isLongForm('---x')).toBe(false);
    expect(isLongForm('-/x')).toBe(false);
    expect(isLongForm('--=x')).toBe(false);
    expect(isLongForm('-a')).toBe(false);
  });
});

describe('looksLikeOption', () => {
  it('should recognise option-shaped text only', () => {
    expect(looksLikeOption('-a')).toBe(true);
    expect(looksLikeOption('--all')).toBe(true);
    expect(looksLikeOption('--')).toBe(false);
    expect(looksLikeOption('-')).toBe(false);
    expect(looksLikeOption('value')).toBe(false);
    expect(looksLikeOption(5)).toBe(false);
  });
});

describe('splitLongBody', () => {
  it('should split at the first = or :', () => {
    expect(splitLongBody('file=a=b')).toEqual({ name: 'file', value: 'a=b' });
    expect(splitLongBody('file:a')).toEqual({ name: 'file', value: 'a' });
    expect(splitLongBody('file=')).toEqual({ name: 'file', value: '' });
    expect(splitLongBody('file')).toEqual({ name: 'file' });
  });
});
