/**
 * Request paths of the config management API
 */

// Characters a URL path segment may carry unescaped, besides letters and digits
const SEGMENT_SAFE = new Set(['-', '_', '.', '~', '$', '&', '+', ':', '=', '@']);

// A whole path also keeps its separators and the remaining sub-delimiters
const PATH_SAFE = new Set([...SEGMENT_SAFE, ',', ';', '/']);

function percentEncode(value: string, safe: ReadonlySet<string>): string {
  let escaped = '';

  for (const byte of Buffer.from(value, 'utf8')) {
    const char = String.fromCharCode(byte);
    if (/^[A-Za-z0-9]$/.test(char) || safe.has(char)) {
      escaped += char;
    } else {
      escaped += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }
  }

  return escaped;
}

/**
 * Escape a value for use as a single URL path segment.
 * Every byte outside the safe set, including '/', becomes %XX.
 */
export function escapePathSegment(value: string): string {
  return percentEncode(value, SEGMENT_SAFE);
}

/**
 * Encode a multi-segment path for the wire. Separators and dot segments
 * stay as they are; '%', backslash and every other unsafe byte become %XX.
 */
export function escapePath(value: string): string {
  return percentEncode(value, PATH_SAFE);
}

export function packagesPath(): string {
  return '/v1/config/packages';
}

export function stagePath(packageName: string, stage: string): string {
  return `/v1/config/stages/${escapePathSegment(packageName)}/${escapePathSegment(stage)}`;
}

/**
 * Path of one file in a stage. The file name keeps its '/' separators
 * and is only encoded for the wire, unless escapeFileName is set,
 * in which case each segment is escaped on its own.
 */
export function filePath(
  packageName: string,
  stage: string,
  fileName: string,
  escapeFileName = false
): string {
  const file = escapeFileName
    ? fileName.split('/').map(escapePathSegment).join('/')
    : escapePath(fileName);

  return `/v1/config/files/${escapePathSegment(packageName)}/${escapePathSegment(stage)}/${file}`;
}

/**
 * Name of the bundle file written for a package
 */
export function bundleFileName(packageName: string): string {
  return `${escapePathSegment(packageName)}.json`;
}
