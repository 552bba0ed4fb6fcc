/**
 * Provisioning Type Definitions
 * Types shared by the binary provisioning modules.
 */

/** Operating systems rulekit is released for */
export type TargetOs = 'darwin' | 'linux' | 'windows';

/** Architectures rulekit is released for */
export type TargetArch = 'amd64' | 'arm64' | '386';

/** Canonical (os, arch) pair used in artifact naming */
export interface PlatformTarget {
  readonly os: TargetOs;
  readonly arch: TargetArch;
}

/** Archive formats used by releases */
export type ArchiveKind = 'zip' | 'tar.gz';

/** Everything derived from (version, platform) for one download */
export interface ArtifactRef {
  version: string;
  platform: PlatformTarget;
  archiveName: string;
  archiveKind: ArchiveKind;
  binaryUrl: string;
  checksumsUrl: string;
  releasePageUrl: string;
}

/** Host strings as reported by the runtime (process.platform / process.arch) */
export interface HostInfo {
  platform: string;
  arch: string;
}

/** Provisioner state machine */
export type ProvisionState =
  | 'needs-verification'
  | 'valid-cache-hit'
  | 'needs-download'
  | 'provisioned'
  | 'failed';

/** Resolved launcher configuration, built once at startup */
export interface ProvisionerConfig {
  /** Version of the binary this launcher expects */
  version: string;
  /** Base name of the executable (without platform extension) */
  binaryName: string;
  /** Release repository base, e.g. https://github.com/<owner>/<repo>/releases */
  releaseBaseUrl: string;
  /** Per-user cache root holding the executable and its version marker */
  cacheDir: string;
  /** Locally built binary to prefer over the cache (development mode) */
  devBinaryPath: string | null;
  /** Download attempts per file */
  maxAttempts: number;
  /** Delay before the first retry (ms) */
  initialDelayMs: number;
  /** Upper bound for the retry delay (ms) */
  delayCapMs: number;
  /** Per-request network timeout (ms) */
  requestTimeoutMs: number;
  /** Print debug lines to stderr */
  verbose: boolean;
  /** Suppress progress output */
  quiet: boolean;
}

/** Outcome of a successful fetchWithRetry call */
export interface DownloadResult {
  filePath: string;
  bytes: number;
  attempts: number;
}

/** Observer for retry scheduling */
export type RetryCallback = (attempt: { attempt: number; delayMs: number; error: Error }) => void;

/** Sleep implementation (injected in tests) */
export type SleepFn = (ms: number) => Promise<void>;
