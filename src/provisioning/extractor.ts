/**
 * Archive Extractor
 * Facade for tar.gz and zip archive extraction.
 */

import type { ArchiveKind } from './types';
import { extractTarGz } from './tar-extractor';
import { extractZip } from './zip-extractor';

// Re-export for convenience
export { extractTarGz } from './tar-extractor';
export { extractZip } from './zip-extractor';

/** Pulls the executable entry out of one archive format */
export interface ArchiveExtractor {
  readonly kind: ArchiveKind;
  /** @returns bytes written to destPath */
  extractExecutable(archivePath: string, executableName: string, destPath: string): Promise<number>;
}

export const EXTRACTORS: Readonly<Record<ArchiveKind, ArchiveExtractor>> = {
  'tar.gz': { kind: 'tar.gz', extractExecutable: extractTarGz },
  zip: { kind: 'zip', extractExecutable: extractZip },
};

export function getExtractor(kind: ArchiveKind): ArchiveExtractor {
  return EXTRACTORS[kind];
}

/**
 * Extract the executable from an archive based on its kind
 */
export function extractExecutable(
  archivePath: string,
  kind: ArchiveKind,
  executableName: string,
  destPath: string
): Promise<number> {
  return getExtractor(kind).extractExecutable(archivePath, executableName, destPath);
}
