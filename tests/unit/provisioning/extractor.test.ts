import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import * as crypto from 'crypto';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as zlib from 'zlib';
import { ExtractionError } from '../../../src/errors';
import { matchesExecutable } from '../../../src/provisioning/archive-entry';
import {
  extractExecutable,
  extractTarGz,
  extractZip,
  getExtractor,
} from '../../../src/provisioning/extractor';
import { buildTar, buildTarGz, buildZip } from '../../helpers/archive-fixtures';

const SCRIPT = '#!/bin/sh\necho rulekit\n';

describe('extractor', () => {
  let tempDir: string;
  let dest: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rulekit-extractor-test-'));
    dest = path.join(tempDir, 'out.bin');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeArchive(name: string, data: Buffer): string {
    const archivePath = path.join(tempDir, name);
    fs.writeFileSync(archivePath, data);
    return archivePath;
  }

  describe('matchesExecutable', () => {
    it('matches the name at the root or below a directory', () => {
      expect(matchesExecutable('rulekit', 'rulekit')).toBe(true);
      expect(matchesExecutable('rulekit_1.0.0_linux_amd64/rulekit', 'rulekit')).toBe(true);
      expect(matchesExecutable('dist\\rulekit.exe', 'rulekit.exe')).toBe(true);
    });

    it('does not match on a bare suffix or a directory', () => {
      expect(matchesExecutable('not-rulekit', 'rulekit')).toBe(false);
      expect(matchesExecutable('rulekit/', 'rulekit')).toBe(false);
      expect(matchesExecutable('rulekit.sig', 'rulekit')).toBe(false);
    });
  });

  describe('tar.gz', () => {
    it('extracts the executable from a nested directory', async () => {
      const archive = writeArchive(
        'a.tar.gz',
        buildTarGz([
          { name: 'rulekit_1.0.0/', type: '5' },
          { name: 'rulekit_1.0.0/README.md', content: 'docs' },
          { name: 'rulekit_1.0.0/rulekit', content: SCRIPT },
        ])
      );

      await expect(extractTarGz(archive, 'rulekit', dest)).resolves.toBe(SCRIPT.length);
      expect(fs.readFileSync(dest, 'utf8')).toBe(SCRIPT);
    });

    it('streams entries larger than one decompressed chunk', async () => {
      const payload = Buffer.alloc(150 * 1024);
      for (let i = 0; i < payload.length; i++) payload[i] = i % 251;
      const archive = writeArchive(
        'big.tar.gz',
        buildTarGz([
          { name: 'LICENSE', content: 'x'.repeat(700) },
          { name: 'rulekit', content: payload },
        ])
      );

      await expect(extractTarGz(archive, 'rulekit', dest)).resolves.toBe(payload.length);
      expect(fs.readFileSync(dest).equals(payload)).toBe(true);
    });

    it('fails when no entry names the executable', async () => {
      const archive = writeArchive(
        'a.tar.gz',
        buildTarGz([{ name: 'not-rulekit', content: SCRIPT }])
      );

      await expect(extractTarGz(archive, 'rulekit', dest)).rejects.toThrow(
        'No matching entry for rulekit in archive'
      );
      expect(fs.existsSync(dest)).toBe(false);
    });

    it('fails on a tar stream that ends inside the executable', async () => {
      const tar = buildTar([{ name: 'rulekit', content: 'y'.repeat(2000) }]);
      const archive = writeArchive('cut.tar.gz', zlib.gzipSync(tar.subarray(0, 512 + 600)));

      await expect(extractTarGz(archive, 'rulekit', dest)).rejects.toThrow(
        'Archive truncated while extracting rulekit'
      );
      expect(fs.existsSync(dest)).toBe(false);
    });

    it('wraps gzip errors in ExtractionError', async () => {
      const gz = buildTarGz([{ name: 'rulekit', content: SCRIPT }]);
      const archive = writeArchive('bad.tar.gz', gz.subarray(0, gz.length - 12));

      await expect(extractTarGz(archive, 'rulekit', dest)).rejects.toThrow(ExtractionError);
    });

    it('cleans up when the gzip stream breaks partway through a large entry', async () => {
      const payload = crypto.randomBytes(300 * 1024);
      const gz = buildTarGz([{ name: 'rulekit', content: payload }]);
      const archive = writeArchive('half.tar.gz', gz.subarray(0, Math.floor(gz.length / 2)));

      await expect(extractTarGz(archive, 'rulekit', dest)).rejects.toThrow(
        'Failed to read tar.gz archive'
      );
      expect(fs.existsSync(dest)).toBe(false);
    });
  });

  describe('zip', () => {
    it('extracts a stored entry', async () => {
      const archive = writeArchive(
        'a.zip',
        buildZip([
          { name: 'README.md', content: 'docs' },
          { name: 'rulekit.exe', content: SCRIPT },
        ])
      );

      await expect(extractZip(archive, 'rulekit.exe', dest)).resolves.toBe(SCRIPT.length);
      expect(fs.readFileSync(dest, 'utf8')).toBe(SCRIPT);
    });

    it('inflates a deflated entry below a directory', async () => {
      const payload = 'MZ'.padEnd(40000, 'abc');
      const archive = writeArchive(
        'a.zip',
        buildZip([{ name: 'rulekit_1.0.0/rulekit.exe', content: payload, method: 'deflate' }])
      );

      await expect(extractZip(archive, 'rulekit.exe', dest)).resolves.toBe(payload.length);
      expect(fs.readFileSync(dest, 'utf8')).toBe(payload);
    });

    it('writes an empty file for an empty entry', async () => {
      const archive = writeArchive('a.zip', buildZip([{ name: 'rulekit.exe', content: '' }]));

      await expect(extractZip(archive, 'rulekit.exe', dest)).resolves.toBe(0);
      expect(fs.statSync(dest).size).toBe(0);
    });

    it('fails when no entry names the executable', async () => {
      const archive = writeArchive('a.zip', buildZip([{ name: 'rulekit.exe.sig', content: 'x' }]));

      await expect(extractZip(archive, 'rulekit.exe', dest)).rejects.toThrow(
        'No matching entry for rulekit.exe in archive'
      );
    });

    it('rejects unsupported compression methods', async () => {
      const zip = buildZip([{ name: 'rulekit.exe', content: SCRIPT }]);
      const directoryOffset = zip.readUInt32LE(zip.length - 22 + 16);
      zip.writeUInt16LE(12, directoryOffset + 10);
      const archive = writeArchive('a.zip', zip);

      await expect(extractZip(archive, 'rulekit.exe', dest)).rejects.toThrow(
        'Unsupported compression method: 12'
      );
    });

    it('rejects files that are not zip archives', async () => {
      await expect(
        extractZip(writeArchive('tiny.zip', Buffer.alloc(10)), 'rulekit.exe', dest)
      ).rejects.toThrow('Invalid ZIP file: too small');
      await expect(
        extractZip(writeArchive('zeros.zip', Buffer.alloc(200)), 'rulekit.exe', dest)
      ).rejects.toThrow('Invalid ZIP file: EOCD not found');
    });
  });

  describe('facade', () => {
    it('selects the extractor by archive kind', () => {
      expect(getExtractor('zip').kind).toBe('zip');
      expect(getExtractor('tar.gz').kind).toBe('tar.gz');
    });

    it('dispatches extraction by kind', async () => {
      const archive = writeArchive('a.zip', buildZip([{ name: 'pkg', content: SCRIPT }]));
      await expect(extractExecutable(archive, 'zip', 'pkg', dest)).resolves.toBe(SCRIPT.length);
    });
  });
});
