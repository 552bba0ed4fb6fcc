import { describe, expect, it } from '@jest/globals';
import {
  getArchiveKind,
  getExecutableName,
  isWindowsHost,
  resolvePlatform,
} from '../../../src/provisioning/platform-detector';
import { UnsupportedPlatformError } from '../../../src/errors';

describe('platform-detector', () => {
  describe('resolvePlatform', () => {
    it.each([
      ['darwin', 'x64', 'darwin', 'amd64'],
      ['darwin', 'arm64', 'darwin', 'arm64'],
      ['linux', 'x64', 'linux', 'amd64'],
      ['linux', 'arm64', 'linux', 'arm64'],
      ['linux', 'ia32', 'linux', '386'],
      ['win32', 'x64', 'windows', 'amd64'],
      ['win32', 'ia32', 'windows', '386'],
    ])('maps %s/%s to %s/%s', (hostOs, hostArch, os, arch) => {
      expect(resolvePlatform(hostOs, hostArch)).toEqual({ os, arch });
    });

    it('accepts uname-style names regardless of case', () => {
      expect(resolvePlatform('Linux', 'x86_64')).toEqual({ os: 'linux', arch: 'amd64' });
      expect(resolvePlatform('linux', 'AARCH64')).toEqual({ os: 'linux', arch: 'arm64' });
      expect(resolvePlatform('windows', 'i686')).toEqual({ os: 'windows', arch: '386' });
    });

    it('returns a frozen target', () => {
      expect(Object.isFrozen(resolvePlatform('linux', 'x64'))).toBe(true);
    });

    it('rejects Windows on ARM64', () => {
      expect(() => resolvePlatform('win32', 'arm64')).toThrow('Windows ARM64 is not supported');
    });

    it('rejects unknown operating systems with the host values attached', () => {
      let caught: unknown;
      try {
        resolvePlatform('freebsd', 'x64');
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(UnsupportedPlatformError);
      if (caught instanceof UnsupportedPlatformError) {
        expect(caught.message).toBe('Unsupported platform: freebsd x64');
        expect(caught.hostOs).toBe('freebsd');
        expect(caught.hostArch).toBe('x64');
        expect(caught.phase).toBe('platform');
      }
    });

    it('rejects unknown architectures', () => {
      expect(() => resolvePlatform('linux', 'mips')).toThrow('Unsupported platform: linux mips');
    });

    it('does not resolve inherited object keys', () => {
      expect(() => resolvePlatform('constructor', 'x64')).toThrow(UnsupportedPlatformError);
    });
  });

  describe('getExecutableName', () => {
    it('adds .exe on Windows only', () => {
      expect(getExecutableName('rulekit', 'win32')).toBe('rulekit.exe');
      expect(getExecutableName('rulekit', 'linux')).toBe('rulekit');
      expect(getExecutableName('rulekit', 'darwin')).toBe('rulekit');
    });
  });

  describe('isWindowsHost', () => {
    it('recognizes both Windows spellings', () => {
      expect(isWindowsHost('win32')).toBe(true);
      expect(isWindowsHost('windows')).toBe(true);
      expect(isWindowsHost('linux')).toBe(false);
    });
  });

  describe('getArchiveKind', () => {
    it('uses zip for Windows and tar.gz elsewhere', () => {
      expect(getArchiveKind('windows')).toBe('zip');
      expect(getArchiveKind('linux')).toBe('tar.gz');
      expect(getArchiveKind('darwin')).toBe('tar.gz');
    });
  });
});
