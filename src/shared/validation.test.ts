import { describe, it, expect } from 'vitest';
import { isValidMessage, isValidName, parseAge, sanitizeInput } from './validation';
import { detectLanguage, isRightToLeft } from './language';

describe('validation', () => {
  it('sanitizes control characters and length', () => {
    expect(sanitizeInput('  hi\u0007 there\n ')).toBe('hi there');
    expect(sanitizeInput('abcdef', 3)).toBe('abc');
  });

  it('needs a letter or digit in a message', () => {
    expect(isValidMessage('ok')).toBe(true);
    expect(isValidMessage('حسناً')).toBe(true);
    expect(isValidMessage('   ')).toBe(false);
    expect(isValidMessage('?!')).toBe(false);
  });

  it('accepts names in any script', () => {
    expect(isValidName('Sam')).toBe(true);
    expect(isValidName("Mary-Jane O'Neil")).toBe(true);
    expect(isValidName('سارة')).toBe(true);
  });

  it('rejects digits and overly long names', () => {
    expect(isValidName('1234')).toBe(false);
    expect(isValidName('a b c d e')).toBe(false);
    expect(isValidName('')).toBe(false);
  });

  it('parses whole-number ages only', () => {
    expect(parseAge(' 29 ')).toBe(29);
    expect(parseAge('29.5')).toBeNull();
    expect(parseAge('about thirty')).toBeNull();
    expect(parseAge('1000')).toBeNull();
  });
});

describe('language', () => {
  it('detects the dominant script', () => {
    expect(detectLanguage('How are you?')).toBe('en');
    expect(detectLanguage('كيف حالك؟')).toBe('ar');
    expect(detectLanguage('ok شكراً جزيلاً')).toBe('ar');
    expect(detectLanguage('123 !!')).toBeNull();
  });

  it('marks Arabic as right to left', () => {
    expect(isRightToLeft('ar')).toBe(true);
    expect(isRightToLeft('en')).toBe(false);
  });
});
