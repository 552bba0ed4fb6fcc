/**
 * Archive entry helpers shared by the tar.gz and zip extractors.
 */

import * as fs from 'fs';

/**
 * True when an entry path names the executable, either at the archive root
 * or under any directory prefix ("rulekit", "rulekit_1.0.0/rulekit").
 */
export function matchesExecutable(entryName: string, executableName: string): boolean {
  const normalized = entryName.replace(/\\/g, '/');
  if (normalized.endsWith('/')) return false;
  return normalized === executableName || normalized.endsWith(`/${executableName}`);
}

/** Write a chunk, waiting for it to be flushed */
export function writeChunk(out: fs.WriteStream, chunk: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    out.write(chunk, (err) => (err ? reject(err) : resolve()));
  });
}

/** End a write stream and wait for the file to be closed */
export function closeStream(out: fs.WriteStream): Promise<void> {
  return new Promise((resolve, reject) => {
    out.once('error', reject);
    out.once('close', () => resolve());
    out.end();
  });
}
