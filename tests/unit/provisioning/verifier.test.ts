import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  computeChecksum,
  parseChecksum,
  parseChecksumManifest,
  verifyChecksum,
} from '../../../src/provisioning/verifier';

const HELLO_SHA256 = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';
const EMPTY_SHA256 = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

describe('verifier', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rulekit-verifier-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('computeChecksum', () => {
    it('returns the lowercase hex SHA-256 of the file', async () => {
      const file = path.join(tempDir, 'hello.txt');
      fs.writeFileSync(file, 'hello');
      await expect(computeChecksum(file)).resolves.toBe(HELLO_SHA256);
    });

    it('hashes empty files', async () => {
      const file = path.join(tempDir, 'empty');
      fs.writeFileSync(file, '');
      await expect(computeChecksum(file)).resolves.toBe(EMPTY_SHA256);
    });

    it('hashes files larger than one read chunk', async () => {
      const file = path.join(tempDir, 'big.bin');
      fs.writeFileSync(file, Buffer.alloc(200 * 1024, 7));
      const digest = await computeChecksum(file);
      expect(digest).toMatch(/^[0-9a-f]{64}$/);
      await expect(computeChecksum(file)).resolves.toBe(digest);
    });

    it('rejects for a missing file', async () => {
      await expect(computeChecksum(path.join(tempDir, 'missing'))).rejects.toThrow('ENOENT');
    });
  });

  describe('parseChecksum', () => {
    const manifest = [
      `${HELLO_SHA256}  rulekit_1.0.0_linux_amd64.tar.gz`,
      '',
      'not a checksum line',
      `${EMPTY_SHA256.toUpperCase()} *rulekit_1.0.0_windows_amd64.zip`,
      `${EMPTY_SHA256}  rulekit_1.0.0_linux_amd64.tar.gz`,
    ].join('\r\n');

    it('finds the digest for an exact file name', () => {
      expect(parseChecksum(manifest, 'rulekit_1.0.0_linux_amd64.tar.gz')).toBe(HELLO_SHA256);
    });

    it('lowercases digests and ignores the binary-mode marker', () => {
      expect(parseChecksum(manifest, 'rulekit_1.0.0_windows_amd64.zip')).toBe(EMPTY_SHA256);
    });

    it('returns null for absent names and partial matches', () => {
      expect(parseChecksum(manifest, 'rulekit_1.0.0_darwin_arm64.tar.gz')).toBeNull();
      expect(parseChecksum(manifest, 'linux_amd64.tar.gz')).toBeNull();
    });

    it('keeps the first record for duplicated names', () => {
      const entries = parseChecksumManifest(manifest);
      expect(entries.size).toBe(2);
      expect(entries.get('rulekit_1.0.0_linux_amd64.tar.gz')).toBe(HELLO_SHA256);
    });
  });

  describe('verifyChecksum', () => {
    it('is valid when the manifest digest matches', async () => {
      const file = path.join(tempDir, 'a.tar.gz');
      fs.writeFileSync(file, 'hello');
      const result = await verifyChecksum(file, 'a.tar.gz', `${HELLO_SHA256}  a.tar.gz\n`);
      expect(result).toEqual({ valid: true, expected: HELLO_SHA256, actual: HELLO_SHA256 });
    });

    it('is invalid when the manifest has no entry', async () => {
      const file = path.join(tempDir, 'a.tar.gz');
      fs.writeFileSync(file, 'hello');
      const result = await verifyChecksum(file, 'a.tar.gz', `${HELLO_SHA256}  b.tar.gz\n`);
      expect(result).toEqual({ valid: false, expected: null, actual: HELLO_SHA256 });
    });

    it('is invalid when the file content differs', async () => {
      const file = path.join(tempDir, 'a.tar.gz');
      fs.writeFileSync(file, '');
      const result = await verifyChecksum(file, 'a.tar.gz', `${HELLO_SHA256}  a.tar.gz\n`);
      expect(result.valid).toBe(false);
      expect(result.actual).toBe(EMPTY_SHA256);
    });
  });
});
