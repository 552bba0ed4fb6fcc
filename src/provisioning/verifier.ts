/**
 * Checksum Verifier
 * SHA-256 digests of downloaded archives and lookups in the release manifest.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';

/** Read size used when hashing files */
const HASH_CHUNK_SIZE = 64 * 1024;

const MANIFEST_LINE = /^([0-9a-fA-F]+)\s+\*?(.+)$/;

/**
 * Compute SHA-256 of a file without loading it into memory
 */
export function computeChecksum(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = fs.createReadStream(filePath, { highWaterMark: HASH_CHUNK_SIZE });

    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
    stream.on('error', reject);
  });
}

/**
 * Parse every `<digest>  <filename>` record of a manifest.
 * Blank and malformed lines are skipped; the first record for a name wins.
 */
export function parseChecksumManifest(manifestText: string): Map<string, string> {
  const entries = new Map<string, string>();

  for (const rawLine of manifestText.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const match = MANIFEST_LINE.exec(line);
    if (!match) continue;

    const digest = match[1].toLowerCase();
    const fileName = match[2].trim();
    if (!entries.has(fileName)) {
      entries.set(fileName, digest);
    }
  }

  return entries;
}

/**
 * Expected digest for an exact file name, or null when the manifest has no entry
 */
export function parseChecksum(manifestText: string, fileName: string): string | null {
  return parseChecksumManifest(manifestText).get(fileName) ?? null;
}

export interface ChecksumResult {
  valid: boolean;
  expected: string | null;
  actual: string;
}

/**
 * Compare a file against its manifest entry
 */
export async function verifyChecksum(
  filePath: string,
  fileName: string,
  manifestText: string
): Promise<ChecksumResult> {
  const expected = parseChecksum(manifestText, fileName);
  const actual = await computeChecksum(filePath);
  return { valid: expected !== null && expected === actual, expected, actual };
}
