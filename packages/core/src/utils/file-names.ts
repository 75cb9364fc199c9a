/**
 * Encode an identifier as a single path segment. Reversible with fromSafeFileName.
 * Characters outside [A-Za-z0-9_-] are percent-encoded, including '.', so ids
 * such as '..' cannot escape the target directory.
 */
export function toSafeFileName(id: string): string {
  return id.replace(/[^A-Za-z0-9_-]/gu, (char) =>
    Array.from(Buffer.from(char, 'utf8'))
      .map((byte) => `%${byte.toString(16).toUpperCase().padStart(2, '0')}`)
      .join('')
  );
}

export function fromSafeFileName(name: string): string {
  return decodeURIComponent(name);
}

/** True for the ENOENT error fs raises for a missing file or directory. */
export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
