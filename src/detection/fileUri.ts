/**
 * file:// URI helpers shared by the bus and window-property strategies
 */

const FILE_SCHEME = 'file://';

/**
 * Strips the scheme and percent-decodes. Null for other schemes or bad escapes.
 */
export function decodeFileUri(uri: string): string | null {
  const trimmed = uri.trim();
  if (!trimmed.startsWith(FILE_SCHEME)) {
    return null;
  }

  let rest = trimmed.slice(FILE_SCHEME.length);
  // file://localhost/path
  if (rest.startsWith('localhost/')) {
    rest = rest.slice('localhost'.length);
  }
  if (!rest.startsWith('/')) {
    return null;
  }

  try {
    const decoded = decodeURIComponent(rest);
    return decoded.includes('\0') ? null : decoded;
  } catch {
    return null;
  }
}

/**
 * Every quoted file:// URI in a tool's textual output, in order
 */
export function findQuotedFileUris(output: string): string[] {
  const uris: string[] = [];
  const pattern = /["']([^"']*file:\/\/[^"']*)["']/g;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(output)) !== null) {
    const quoted = match[1] ?? '';
    const start = quoted.indexOf(FILE_SCHEME);
    uris.push(quoted.slice(start));
  }

  return uris;
}
