/**
 * Version Cache
 * Per-user cache directory holding the executable and a `.version` marker naming
 * the release it came from.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CacheIOError, describeError, errorCode } from '../errors';

export const VERSION_MARKER_FILE = '.version';

/** Key-value persistence behind the version marker */
export interface VersionStore {
  read(key: string): string | null;
  write(key: string, value: string): void;
  remove(key: string): void;
}

/**
 * Stores each key as a file inside a directory.
 * Writes go to a temp file first and are renamed into place.
 */
export class FileVersionStore implements VersionStore {
  constructor(private readonly dir: string) {}

  private keyPath(key: string): string {
    return path.join(this.dir, key);
  }

  read(key: string): string | null {
    const filePath = this.keyPath(key);
    try {
      return fs.readFileSync(filePath, 'utf8').trim();
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return null;
      throw new CacheIOError(`Failed to read ${key}: ${describeError(error)}`, filePath, {
        cause: error,
      });
    }
  }

  write(key: string, value: string): void {
    const filePath = this.keyPath(key);
    const tempPath = `${filePath}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`;
    try {
      fs.mkdirSync(this.dir, { recursive: true });
      fs.writeFileSync(tempPath, value, 'utf8');
      fs.renameSync(tempPath, filePath);
    } catch (error) {
      if (fs.existsSync(tempPath)) fs.rmSync(tempPath, { force: true });
      throw new CacheIOError(`Failed to write ${key}: ${describeError(error)}`, filePath, {
        cause: error,
      });
    }
  }

  remove(key: string): void {
    const filePath = this.keyPath(key);
    try {
      fs.rmSync(filePath, { force: true });
    } catch (error) {
      throw new CacheIOError(`Failed to remove ${key}: ${describeError(error)}`, filePath, {
        cause: error,
      });
    }
  }
}

/** In-memory store (tests, dry runs) */
export class MemoryVersionStore implements VersionStore {
  private readonly values = new Map<string, string>();

  read(key: string): string | null {
    const value = this.values.get(key);
    return value === undefined ? null : value.trim();
  }

  write(key: string, value: string): void {
    this.values.set(key, value);
  }

  remove(key: string): void {
    this.values.delete(key);
  }
}

/**
 * Default cache root for the current user
 */
export function getDefaultCacheDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: string = process.platform,
  homedir: string = os.homedir()
): string {
  if (env.RULEKIT_CACHE_DIR) return env.RULEKIT_CACHE_DIR;

  if (platform === 'darwin') {
    return path.join(homedir, 'Library', 'Caches', 'rulekit');
  }
  if (platform === 'win32') {
    const localAppData = env.LOCALAPPDATA || path.join(homedir, 'AppData', 'Local');
    return path.join(localAppData, 'rulekit', 'Cache');
  }
  const xdgCache = env.XDG_CACHE_HOME || path.join(homedir, '.cache');
  return path.join(xdgCache, 'rulekit');
}

export class VersionCache {
  private readonly store: VersionStore;

  constructor(
    private readonly dir: string,
    store?: VersionStore
  ) {
    this.store = store ?? new FileVersionStore(dir);
  }

  /** Cache root, created if absent */
  cacheDir(): string {
    try {
      fs.mkdirSync(this.dir, { recursive: true });
    } catch (error) {
      throw new CacheIOError(
        `Failed to create cache directory: ${describeError(error)}`,
        this.dir,
        { cause: error }
      );
    }
    return this.dir;
  }

  versionMarkerPath(): string {
    return path.join(this.dir, VERSION_MARKER_FILE);
  }

  /** Version recorded by the last successful install, or null */
  readRecordedVersion(): string | null {
    return this.store.read(VERSION_MARKER_FILE);
  }

  isCurrent(expectedVersion: string): boolean {
    const recorded = this.readRecordedVersion();
    return recorded !== null && recorded === expectedVersion;
  }

  recordCurrent(version: string): void {
    this.store.write(VERSION_MARKER_FILE, version);
  }

  /** Forget the recorded version so the next run re-provisions */
  clear(): void {
    this.store.remove(VERSION_MARKER_FILE);
  }
}
