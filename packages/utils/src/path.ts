/**
 * Path Utilities
 */

/**
 * Reduce an uploaded filename to a safe basename.
 *
 * Directory separators become underscores, non-ASCII characters are
 * transliterated where possible and dropped otherwise, and only
 * `[A-Za-z0-9_.-]` survive. Leading/trailing dots and underscores are
 * stripped so the result can never be `.`, `..` or a hidden file.
 * May return an empty string.
 */
export function secureFilename(filename: string): string {
  const ascii = filename
    .normalize('NFKD')
    .replace(/[^\x00-\x7f]/g, '');

  return ascii
    .replace(/[/\\]/g, ' ')
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .join('_')
    .replace(/[^A-Za-z0-9_.-]/g, '')
    .replace(/^[._]+|[._]+$/g, '');
}

/**
 * Normalise an extension to its dotted form: `bin` and `.bin` both give `.bin`
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}
