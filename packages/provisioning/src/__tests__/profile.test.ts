import { describe, it, expect } from 'vitest';
import { normalizeProfileName } from '../profile';

describe('normalizeProfileName', () => {
  it('should join everything after the architecture with dashes', () => {
    expect(normalizeProfileName('x86_64:SLE-15-SP5-Server-LATEST:install')).toBe(
      'x86_64:SLE-15-SP5-Server-LATEST-install',
    );
    expect(normalizeProfileName('aarch64:openSUSE:Leap:15.6')).toBe('aarch64:openSUSE-Leap-15.6');
  });

  it('should leave names with a single separator alone', () => {
    expect(normalizeProfileName('x86_64:rescue')).toBe('x86_64:rescue');
  });

  it('should leave names without a separator alone', () => {
    expect(normalizeProfileName('local')).toBe('local');
  });
});
