/**
 * Artifact Locator
 * Builds release archive names and URLs. Pure string composition, no network.
 */

import { getArchiveKind } from './platform-detector';
import type { ArtifactRef, PlatformTarget } from './types';

/** Default release repository */
export const DEFAULT_RELEASE_BASE_URL = 'https://github.com/rulekit/rulekit/releases';

/** File name of the checksum manifest published with every release */
export const CHECKSUMS_FILE = 'checksums.txt';

export interface LocatorOptions {
  binaryName: string;
  releaseBaseUrl?: string;
}

/** Strip a leading "v" so "v1.2.3" and "1.2.3" name the same release */
export function normalizeVersion(version: string): string {
  const trimmed = version.trim();
  return /^v\d/.test(trimmed) ? trimmed.slice(1) : trimmed;
}

function releaseBase(options: Pick<LocatorOptions, 'releaseBaseUrl'>): string {
  return (options.releaseBaseUrl ?? DEFAULT_RELEASE_BASE_URL).replace(/\/+$/, '');
}

function releaseTag(version: string): string {
  return `v${normalizeVersion(version)}`;
}

/**
 * Archive file name: <binary>_<version>_<os>_<arch>.<ext>
 */
export function getArchiveName(binaryName: string, version: string, target: PlatformTarget): string {
  const ext = getArchiveKind(target.os);
  return `${binaryName}_${normalizeVersion(version)}_${target.os}_${target.arch}.${ext}`;
}

export function getDownloadUrl(
  version: string,
  target: PlatformTarget,
  options: LocatorOptions
): string {
  const archiveName = getArchiveName(options.binaryName, version, target);
  return `${releaseBase(options)}/download/${releaseTag(version)}/${archiveName}`;
}

export function getChecksumsUrl(
  version: string,
  options: Pick<LocatorOptions, 'releaseBaseUrl'> = {}
): string {
  return `${releaseBase(options)}/download/${releaseTag(version)}/${CHECKSUMS_FILE}`;
}

/** Release page offered for manual download */
export function getReleasePageUrl(
  version: string,
  options: Pick<LocatorOptions, 'releaseBaseUrl'> = {}
): string {
  return `${releaseBase(options)}/tag/${releaseTag(version)}`;
}

/**
 * Derive every name and URL needed to fetch one artifact
 */
export function locateArtifact(
  version: string,
  target: PlatformTarget,
  options: LocatorOptions
): ArtifactRef {
  return {
    version: normalizeVersion(version),
    platform: target,
    archiveName: getArchiveName(options.binaryName, version, target),
    archiveKind: getArchiveKind(target.os),
    binaryUrl: getDownloadUrl(version, target, options),
    checksumsUrl: getChecksumsUrl(version, options),
    releasePageUrl: getReleasePageUrl(version, options),
  };
}
