/**
 * Lower-cases, strips accents and punctuation, and collapses whitespace so that
 * keyword matching works the same for "Contraseña?" and "contrasena".
 */
export const normalizeText = (value: string): string => String(value || '')
  .normalize('NFD')
  .replace(/[\u0300-\u036f]/g, '')
  .toLowerCase()
  .replace(/[¿?¡!.,;:()[\]{}"'`’“”]/g, ' ')
  .replace(/\s+/g, ' ')
  .trim();

/** Whole-word/phrase match against text already passed through `normalizeText`. */
export const containsPhrase = (normalizedText: string, phrase: string): boolean => {
  const needle = normalizeText(phrase);
  if (!needle) return false;
  return ` ${normalizedText} `.includes(` ${needle} `);
};

export const findFirstPhrase = (normalizedText: string, phrases: readonly string[]): string | null =>
  phrases.find((phrase) => containsPhrase(normalizedText, phrase)) ?? null;
