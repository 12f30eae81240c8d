import path from 'node:path';

const LANGUAGE_CODE = /_[a-zA-Z]{2,3}(?=_|$)/;

/** Makes `value` usable as a single path segment: no separators, reserved characters or whitespace. */
export function sanitizePathSegment(value: string): string {
  return value
    .trim()
    .replace(/[\u0000-\u001f/\\:*?"<>|]/g, '-')
    .replace(/\s+/g, '-');
}

/** Turns a language name or code into something safe to embed in a filename. */
export function languageToken(lang: string): string {
  return sanitizePathSegment(lang);
}

/**
 * Rewrites the first `_xx` / `_xxx` language code in the name part of
 * `filename` to `_<targetLang>`, or appends one before the extension.
 *
 *   replaceLanguageInFilename('readme_en.md', 'fr')  // 'readme_fr.md'
 *   replaceLanguageInFilename('notes.txt', 'fr')     // 'notes_fr.txt'
 */
export function replaceLanguageInFilename(filename: string, targetLang: string): string {
  const ext = path.extname(filename);
  const name = ext ? filename.slice(0, -ext.length) : filename;
  const token = `_${languageToken(targetLang)}`;
  if (LANGUAGE_CODE.test(name)) {
    return name.replace(LANGUAGE_CODE, () => token) + ext;
  }
  return `${name}${token}${ext}`;
}
