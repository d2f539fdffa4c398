import { describe, it, expect } from 'vitest';
import { shellOption, shellQuote } from '../shell';

describe('shellQuote', () => {
  it('should pass safe words through', () => {
    expect(shellQuote('x86_64:SLE-15-SP5-Server-LATEST-install')).toBe('x86_64:SLE-15-SP5-Server-LATEST-install');
    expect(shellQuote('52:54:00:aa:bb:01')).toBe('52:54:00:aa:bb:01');
  });

  it('should quote words with spaces and separators', () => {
    expect(shellQuote('a b;c')).toBe("'a b;c'");
    expect(shellQuote('$(reboot)')).toBe("'$(reboot)'");
  });

  it('should escape embedded single quotes', () => {
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });

  it('should quote the empty string', () => {
    expect(shellQuote('')).toBe("''");
  });
});

describe('shellOption', () => {
  it('should render a long option', () => {
    expect(shellOption('power-id', 4)).toBe(' --power-id=4');
    expect(shellOption('power-pass', 'a b')).toBe(" --power-pass='a b'");
  });
});
