export type TextDirection = 'ltr' | 'rtl' | 'unknown';

/** Arabic, Arabic Supplement, Arabic Extended-A and the Arabic presentation forms. */
const RTL_CHARACTERS = /[\u0600-\u06FF\u0750-\u077F\u08A0-\u08FF\uFB50-\uFDFF\uFE70-\uFEFF]/g;

const RTL_THRESHOLD = 0.3;

export function detectTextDirection(text: string): TextDirection {
  const length = Array.from(text).length;
  if (length === 0) {
    return 'unknown';
  }

  const rtlCount = text.match(RTL_CHARACTERS)?.length ?? 0;
  return rtlCount / length > RTL_THRESHOLD ? 'rtl' : 'ltr';
}

/**
 * Best-effort guess of a user's language from their first message, used when
 * registering them. Only Arabic script is told apart; everything else is
 * English.
 */
export function detectLanguage(text: string | undefined): string {
  if (!text) {
    return 'en';
  }

  return detectTextDirection(text) === 'rtl' ? 'ar' : 'en';
}
