import { describe, it, expect } from 'vitest';
import { quoteForShell, resolveShell } from './quote';

describe('resolveShell', () => {
  it('should map shell names to quoting rules', () => {
    expect(resolveShell('sh')).toBe('sh');
    expect(resolveShell('bash')).toBe('sh');
    expect(resolveShell('tcsh')).toBe('tcsh');
    expect(resolveShell('csh')).toBe('tcsh');
  });

  it('should return undefined for unsupported shells', () => {
    expect(resolveShell('fish')).toBeUndefined();
    expect(resolveShell('toString')).toBeUndefined();
  });
});

describe('quoteForShell', () => {
  it('should wrap values in single quotes', () => {
    expect(quoteForShell('Archive.zip')).toBe("'Archive.zip'");
    expect(quoteForShell('')).toBe("''");
    expect(quoteForShell('a b')).toBe("'a b'");
  });

  it('should close and reopen quotes around an embedded quote', () => {
    expect(quoteForShell("it's")).toBe("'it'\\''s'");
  });

  it('should escape history and newlines for tcsh', () => {
    expect(quoteForShell('a!b\nc', 'tcsh')).toBe("'a\\!b\\\nc'");
    expect(quoteForShell('a!b', 'sh')).toBe("'a!b'");
  });
});
