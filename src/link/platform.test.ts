import { describe, it, expect } from '@jest/globals';
import { createLinkStrategy, detectPlatform, getPlatformName } from './platform.js';

describe('platform', () => {
  it('should map node platform ids', () => {
    expect(detectPlatform('win32')).toBe('win32');
    expect(detectPlatform('darwin')).toBe('darwin');
    expect(detectPlatform('linux')).toBe('linux');
    expect(detectPlatform('freebsd')).toBe('linux');
  });

  it('should name platforms for display', () => {
    expect(getPlatformName('darwin')).toBe('macOS');
    expect(getPlatformName('win32')).toBe('Windows');
    expect(getPlatformName('linux')).toBe('Linux');
  });

  it('should pick junctions on Windows and symlinks elsewhere', () => {
    expect(createLinkStrategy('win32').kind).toBe('junction');
    expect(createLinkStrategy('darwin').kind).toBe('symlink');
    expect(createLinkStrategy('linux').kind).toBe('symlink');
  });
});
