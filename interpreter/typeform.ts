/**
 * Style annotation decoding.
 *
 * A typeform string carries one decimal digit per input character; each
 * digit is the style value applied to that character (0 = plain).
 */

export type TypeformResult =
  | { ok: true; typeform: number[] }
  | { ok: false; index: number; character: string };

export function decodeTypeform(text: string): TypeformResult {
  const typeform: number[] = [];
  for (let index = 0; index < text.length; index++) {
    const code = text.charCodeAt(index) - 48; // '0'
    if (code < 0 || code > 9) {
      return { ok: false, index, character: text.charAt(index) };
    }
    typeform.push(code);
  }
  return { ok: true, typeform };
}
