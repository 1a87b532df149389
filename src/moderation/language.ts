/**
 * Character-set language heuristic for rule selection.
 * Kazakh shares the Cyrillic script with Russian, so the Kazakh-only letters
 * are checked first; anything without Cyrillic counts as English.
 */

import type { LanguageCode } from '../types/models.js';

const KAZAKH_LETTERS = /[әғқңөұүһіӘҒҚҢӨҰҮҺІ]/;
const CYRILLIC = /[\u0400-\u04ff]/;

export function detectLanguage(text: string): LanguageCode {
  if (KAZAKH_LETTERS.test(text)) return 'kk';
  if (CYRILLIC.test(text)) return 'ru';
  return 'en';
}
