// Checked in order, first match wins. Longer suffixes come before the
// shorter ones they end with (" - Copy (2)" before " (2)").
export const COPY_SUFFIX_PATTERNS: readonly RegExp[] = [
  / copy \d+$/,       // "file copy 2"
  / copy$/,           // "file copy"
  / - Copy \(\d+\)$/, // "file - Copy (2)"
  / - Copy$/,         // "file - Copy"
  / \(\d+\)$/,        // "file (1)"
  /\(\d+\)$/,         // "file(1)"
];

export interface SplitName {
  stem: string;
  extension?: string;
}

/**
 * Split a filename at its last dot. Names without a dot have no extension.
 */
export function splitFilename(filename: string): SplitName {
  const dot = filename.lastIndexOf('.');
  if (dot === -1) {
    return { stem: filename };
  }
  return { stem: filename.slice(0, dot), extension: filename.slice(dot + 1) };
}

export function stripCopySuffix(stem: string): string {
  for (const pattern of COPY_SUFFIX_PATTERNS) {
    if (pattern.test(stem)) {
      return stem.replace(pattern, '');
    }
  }
  return stem;
}

/**
 * Map a filename to the name it had before the OS made a copy of it,
 * e.g. "report - Copy (2).pdf" -> "report.pdf".
 */
export function normalizeFilename(filename: string): string {
  const { stem, extension } = splitFilename(filename);
  const normalized = stripCopySuffix(stem);
  return extension === undefined ? normalized : `${normalized}.${extension}`;
}
