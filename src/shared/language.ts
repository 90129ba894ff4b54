import type { Language } from './types';

const ARABIC_SCRIPT = /[\u0600-\u06FF\u0750-\u077F\u08A0-\u08FF\uFB50-\uFDFF\uFE70-\uFEFF]/g;
const LATIN_LETTER = /[A-Za-z]/g;

/**
 * Detect the script language of a message.
 * Returns 'ar' or 'en', or null when the text carries no letters.
 */
export function detectLanguage(message: string): Language | null {
  const arabic = message.match(ARABIC_SCRIPT)?.length ?? 0;
  const latin = message.match(LATIN_LETTER)?.length ?? 0;

  if (arabic === 0 && latin === 0) {
    return null;
  }

  return arabic >= latin ? 'ar' : 'en';
}

export function isRightToLeft(language: Language): boolean {
  return language === 'ar';
}
