/**
 * Tar.gz Archive Extractor
 * Streams a gzip-compressed ustar archive and copies out the executable entry.
 */

import * as fs from 'fs';
import { pipeline } from 'stream/promises';
import * as zlib from 'zlib';
import { ExtractionError, describeError } from '../errors';
import { closeStream, matchesExecutable, writeChunk } from './archive-entry';

const BLOCK = 512;

interface TarHeader {
  name: string;
  size: number;
  type: string;
}

function readString(header: Buffer, start: number, length: number): string {
  const field = header.subarray(start, start + length);
  const end = field.indexOf(0);
  return field.subarray(0, end === -1 ? field.length : end).toString('utf8');
}

function parseHeader(header: Buffer): TarHeader {
  const name = readString(header, 0, 100);
  const sizeField = readString(header, 124, 12).trim();
  const size = parseInt(sizeField || '0', 8);
  if (Number.isNaN(size) || size < 0) {
    throw new ExtractionError(`Invalid tar header for entry "${name}"`);
  }

  // ustar splits long paths into prefix (345..500) + name
  const magic = readString(header, 257, 6);
  const prefix = magic.startsWith('ustar') ? readString(header, 345, 155) : '';
  const type = String.fromCharCode(header[156] || 0x30);

  return { name: prefix ? `${prefix}/${name}` : name, size, type };
}

/** Regular files are typeflag '0' or NUL (pre-POSIX) */
function isRegularFile(header: TarHeader): boolean {
  return header.type === '0' || header.type === '\0';
}

interface EntryState {
  remaining: number;
  padding: number;
  out: fs.WriteStream | null;
}

/**
 * Incremental tar reader: fed decompressed chunks, writes the selected entry to disk.
 */
class TarEntryScanner {
  private pending: Buffer = Buffer.alloc(0);
  private entry: EntryState | null = null;
  private outputError: Error | null = null;
  written = 0;
  found = false;
  done = false;
  truncated = false;

  constructor(
    private readonly executableName: string,
    private readonly destPath: string
  ) {}

  async push(chunk: Buffer): Promise<void> {
    // Drain the rest of the stream once the entry is out or the end marker is seen
    if (this.done) return;
    this.pending = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;

    while (!this.done) {
      const entry = this.entry;

      if (entry) {
        if (entry.remaining > 0) {
          if (this.pending.length === 0) return;
          const part = this.pending.subarray(0, Math.min(entry.remaining, this.pending.length));
          this.pending = this.pending.subarray(part.length);
          entry.remaining -= part.length;
          if (entry.out) {
            if (this.outputError) throw this.outputError;
            await writeChunk(entry.out, part);
            this.written += part.length;
          }
          continue;
        }
        if (entry.out) {
          if (this.outputError) throw this.outputError;
          await closeStream(entry.out);
          entry.out = null;
          this.found = true;
          this.done = true;
          return;
        }
        if (entry.padding > 0) {
          if (this.pending.length === 0) return;
          const skip = Math.min(entry.padding, this.pending.length);
          this.pending = this.pending.subarray(skip);
          entry.padding -= skip;
          continue;
        }
        this.entry = null;
        continue;
      }

      if (this.pending.length < BLOCK) return;
      const header = this.pending.subarray(0, BLOCK);
      this.pending = this.pending.subarray(BLOCK);

      if (header.every((b) => b === 0)) {
        this.done = true;
        return;
      }

      const parsed = parseHeader(header);
      const selected =
        isRegularFile(parsed) && matchesExecutable(parsed.name, this.executableName);
      this.entry = {
        remaining: parsed.size,
        padding: Math.ceil(parsed.size / BLOCK) * BLOCK - parsed.size,
        out: selected ? this.openOutput() : null,
      };
    }
  }

  private openOutput(): fs.WriteStream {
    const out = fs.createWriteStream(this.destPath);
    out.on('error', (err) => {
      this.outputError = err;
    });
    return out;
  }

  /** Close the output of an entry that never reached its end */
  async release(): Promise<void> {
    const out = this.entry?.out;
    if (!out) return;
    this.entry = null;
    this.truncated = true;
    if (out.closed) return;
    await new Promise<void>((resolve) => {
      out.once('close', () => resolve());
      out.destroy();
    });
  }
}

/**
 * Extract the first entry matching executableName to destPath.
 * @returns bytes written
 */
export async function extractTarGz(
  archivePath: string,
  executableName: string,
  destPath: string
): Promise<number> {
  const scanner = new TarEntryScanner(executableName, destPath);

  try {
    await pipeline(
      fs.createReadStream(archivePath),
      zlib.createGunzip(),
      async (source: AsyncIterable<Buffer>) => {
        try {
          for await (const chunk of source) {
            await scanner.push(chunk);
          }
        } finally {
          await scanner.release();
        }
      }
    );
  } catch (error) {
    await fs.promises.rm(destPath, { force: true });
    if (error instanceof ExtractionError) throw error;
    throw new ExtractionError(`Failed to read tar.gz archive: ${describeError(error)}`, {
      cause: error,
    });
  }

  if (scanner.truncated) {
    await fs.promises.rm(destPath, { force: true });
    throw new ExtractionError(`Archive truncated while extracting ${executableName}`);
  }

  if (!scanner.found) {
    throw new ExtractionError(`No matching entry for ${executableName} in archive`);
  }

  return scanner.written;
}
