/**
 * Named translation mode bits understood by the `mode` option.
 */
export const TRANSLATION_MODES = {
  noContractions: 1,
  compbrlAtCursor: 2,
  dotsIO: 4,
  comp8Dots: 8,
  pass1Only: 16,
  compbrlLeftCursor: 32,
  otherTrans: 64,
  ucBrl: 128
} as const;

export type TranslationModeName = keyof typeof TRANSLATION_MODES;

export function isTranslationModeName(name: string): name is TranslationModeName {
  return Object.prototype.hasOwnProperty.call(TRANSLATION_MODES, name);
}

/**
 * Names of the bits set in `mask`, in ascending bit order.
 */
export function describeMode(mask: number): TranslationModeName[] {
  const names: TranslationModeName[] = [];
  for (const [name, bit] of Object.entries(TRANSLATION_MODES)) {
    if ((mask & bit) !== 0 && isTranslationModeName(name)) {
      names.push(name);
    }
  }
  return names;
}
