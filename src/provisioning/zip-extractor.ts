/**
 * Zip Archive Extractor
 * Reads the central directory with positioned reads and streams the executable entry to disk.
 */

import * as fs from 'fs';
import { Transform } from 'stream';
import { pipeline } from 'stream/promises';
import * as zlib from 'zlib';
import { ExtractionError, describeError } from '../errors';
import { matchesExecutable } from './archive-entry';

const EOCD_SIGNATURE = 0x06054b50;
const CENTRAL_SIGNATURE = 0x02014b50;
const LOCAL_SIGNATURE = 0x04034b50;
const EOCD_MIN_SIZE = 22;
const MAX_COMMENT_SIZE = 0xffff;

const METHOD_STORED = 0;
const METHOD_DEFLATE = 8;

interface ZipEntry {
  name: string;
  method: number;
  compressedSize: number;
  uncompressedSize: number;
  localHeaderOffset: number;
}

async function readAt(
  handle: fs.promises.FileHandle,
  position: number,
  length: number
): Promise<Buffer> {
  const buffer = Buffer.alloc(length);
  const { bytesRead } = await handle.read(buffer, 0, length, position);
  return buffer.subarray(0, bytesRead);
}

async function findCentralDirectory(
  handle: fs.promises.FileHandle,
  fileSize: number
): Promise<{ offset: number; size: number; entries: number }> {
  if (fileSize < EOCD_MIN_SIZE) {
    throw new ExtractionError('Invalid ZIP file: too small');
  }

  const tailLength = Math.min(fileSize, EOCD_MIN_SIZE + MAX_COMMENT_SIZE);
  const tail = await readAt(handle, fileSize - tailLength, tailLength);

  for (let i = tail.length - EOCD_MIN_SIZE; i >= 0; i--) {
    if (tail.readUInt32LE(i) !== EOCD_SIGNATURE) continue;

    const entries = tail.readUInt16LE(i + 10);
    const size = tail.readUInt32LE(i + 12);
    const offset = tail.readUInt32LE(i + 16);
    if (entries === 0xffff || size === 0xffffffff || offset === 0xffffffff) {
      throw new ExtractionError('ZIP64 archives are not supported');
    }
    return { offset, size, entries };
  }

  throw new ExtractionError('Invalid ZIP file: EOCD not found');
}

function parseCentralDirectory(directory: Buffer, count: number): ZipEntry[] {
  const entries: ZipEntry[] = [];
  let offset = 0;

  for (let i = 0; i < count; i++) {
    if (offset + 46 > directory.length || directory.readUInt32LE(offset) !== CENTRAL_SIGNATURE) {
      throw new ExtractionError('Invalid ZIP file: corrupt central directory');
    }

    const nameLength = directory.readUInt16LE(offset + 28);
    const extraLength = directory.readUInt16LE(offset + 30);
    const commentLength = directory.readUInt16LE(offset + 32);

    entries.push({
      method: directory.readUInt16LE(offset + 10),
      compressedSize: directory.readUInt32LE(offset + 20),
      uncompressedSize: directory.readUInt32LE(offset + 24),
      localHeaderOffset: directory.readUInt32LE(offset + 42),
      name: directory.toString('utf8', offset + 46, offset + 46 + nameLength),
    });

    offset += 46 + nameLength + extraLength + commentLength;
  }

  return entries;
}

/** Counts bytes passing through so the inflated size can be checked */
function byteCounter(onBytes: (n: number) => void): Transform {
  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      onBytes(chunk.length);
      callback(null, chunk);
    },
  });
}

/**
 * Find the executable entry and the offset of its data
 */
async function locateEntry(
  archivePath: string,
  executableName: string
): Promise<{ entry: ZipEntry; dataOffset: number }> {
  const handle = await fs.promises.open(archivePath, 'r');
  try {
    const { size: fileSize } = await handle.stat();
    const directory = await findCentralDirectory(handle, fileSize);
    const raw = await readAt(handle, directory.offset, directory.size);
    const entries = parseCentralDirectory(raw, directory.entries);

    const entry = entries.find((e) => matchesExecutable(e.name, executableName));
    if (!entry) {
      throw new ExtractionError(`No matching entry for ${executableName} in archive`);
    }

    const local = await readAt(handle, entry.localHeaderOffset, 30);
    if (local.length < 30 || local.readUInt32LE(0) !== LOCAL_SIGNATURE) {
      throw new ExtractionError('Invalid local file header');
    }
    const dataOffset =
      entry.localHeaderOffset + 30 + local.readUInt16LE(26) + local.readUInt16LE(28);
    return { entry, dataOffset };
  } finally {
    await handle.close();
  }
}

/**
 * Extract the first entry matching executableName to destPath.
 * @returns bytes written
 */
export async function extractZip(
  archivePath: string,
  executableName: string,
  destPath: string
): Promise<number> {
  const { entry, dataOffset } = await locateEntry(archivePath, executableName);

  if (entry.method !== METHOD_STORED && entry.method !== METHOD_DEFLATE) {
    throw new ExtractionError(`Unsupported compression method: ${entry.method}`);
  }

  if (entry.compressedSize === 0) {
    await fs.promises.writeFile(destPath, Buffer.alloc(0));
    return 0;
  }

  let written = 0;
  const counter = byteCounter((n) => {
    written += n;
  });

  try {
    const source = fs.createReadStream(archivePath, {
      start: dataOffset,
      end: dataOffset + entry.compressedSize - 1,
    });

    if (entry.method === METHOD_DEFLATE) {
      await pipeline(source, zlib.createInflateRaw(), counter, fs.createWriteStream(destPath));
    } else {
      await pipeline(source, counter, fs.createWriteStream(destPath));
    }
  } catch (error) {
    await fs.promises.rm(destPath, { force: true });
    throw new ExtractionError(`Failed to extract ${entry.name}: ${describeError(error)}`, {
      cause: error,
    });
  }

  if (written !== entry.uncompressedSize) {
    await fs.promises.rm(destPath, { force: true });
    throw new ExtractionError('Decompression size mismatch');
  }

  return written;
}
