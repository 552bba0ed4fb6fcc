/**
 * Platform Detector
 * Maps the host OS/architecture to the canonical pair used in release artifact names.
 */

import { UnsupportedPlatformError } from '../errors';
import type { ArchiveKind, PlatformTarget, TargetArch, TargetOs } from './types';

const OS_MAP: Readonly<Record<string, TargetOs>> = {
  darwin: 'darwin',
  linux: 'linux',
  win32: 'windows',
  windows: 'windows',
};

// Node names first, then uname -m style names
const ARCH_MAP: Readonly<Record<string, TargetArch>> = {
  x64: 'amd64',
  amd64: 'amd64',
  x86_64: 'amd64',
  arm64: 'arm64',
  aarch64: 'arm64',
  ia32: '386',
  x32: '386',
  i386: '386',
  i686: '386',
  '386': '386',
};

function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  const normalized = key.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(table, normalized) ? table[normalized] : undefined;
}

/**
 * Resolve the release platform for a host.
 * @throws UnsupportedPlatformError for unmapped values and for windows/arm64
 */
export function resolvePlatform(
  hostOs: string = process.platform,
  hostArch: string = process.arch
): PlatformTarget {
  const os = lookup(OS_MAP, hostOs);
  const arch = lookup(ARCH_MAP, hostArch);

  if (!os || !arch) {
    throw new UnsupportedPlatformError(
      `Unsupported platform: ${hostOs} ${hostArch}`,
      hostOs,
      hostArch
    );
  }

  if (os === 'windows' && arch === 'arm64') {
    throw new UnsupportedPlatformError('Windows ARM64 is not supported', hostOs, hostArch);
  }

  return Object.freeze({ os, arch });
}

/** True when the host string denotes Windows */
export function isWindowsHost(hostOs: string = process.platform): boolean {
  return lookup(OS_MAP, hostOs) === 'windows';
}

/**
 * Get the executable file name for the host
 */
export function getExecutableName(binaryName: string, hostOs: string = process.platform): string {
  return isWindowsHost(hostOs) ? `${binaryName}.exe` : binaryName;
}

/** Archive format published for an OS */
export function getArchiveKind(os: TargetOs): ArchiveKind {
  return os === 'windows' ? 'zip' : 'tar.gz';
}
