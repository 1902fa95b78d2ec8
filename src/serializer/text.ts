import { isBareLyricWord, isBareWord } from '../lexer/lexer.js';

const ESCAPES: ReadonlyMap<string, string> = new Map([
  ['\\', '\\\\'],
  ['"', '\\"'],
  ['\n', '\\n'],
  ['\t', '\\t']
]);

/** Double-quoted string literal with `\\`, `"`, newline and tab escaped. */
export function quote(value: string): string {
  let text = '"';
  for (const ch of value) {
    text += ESCAPES.get(ch) ?? ch;
  }
  return `${text}"`;
}

/** A bare word when it lexes back unchanged, otherwise a string literal. */
export function word(value: string): string {
  return isBareWord(value) ? value : quote(value);
}

/** Dotted assignment or property name; quoted when any part is not a plain word. */
export function dottedName(value: string): string {
  return value.split('.').every((part) => isBareWord(part)) ? value : quote(value);
}

/** Lyric syllable text, bare when the lyrics lexer reads it back as one word. */
export function lyricText(value: string): string {
  return isBareLyricWord(value) ? value : quote(value);
}

/** Integer form for whole numbers, shortest decimal form otherwise; never exponent notation. */
export function formatNumber(value: number): string {
  if (Number.isInteger(value)) {
    return value.toFixed(0);
  }
  const text = String(value);
  return text.includes('e') ? value.toFixed(20).replace(/0+$/, '') : text;
}
