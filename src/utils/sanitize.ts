/**
 * Sanitization for free-text form fields.
 *
 * Values are only trimmed and clipped here; escaping happens when the views
 * render them.
 */

const DEFAULT_MAX_LENGTH = 300;

export const FIELD_LIMITS = {
  title: 300,
  description: 2000,
  date: 32,
  location: 200,
  name: 150,
  email: 200,
  phone: 40,
  status: 32,
} as const;

/**
 * Trims whitespace and truncates to `maxLength` characters.
 * Anything that is not a string becomes an empty string.
 */
export const sanitizeText = (input: unknown, maxLength: number = DEFAULT_MAX_LENGTH): string => {
  if (typeof input !== 'string') return '';

  const trimmed = input.trim();
  if (trimmed.length <= maxLength) return trimmed;

  // Clip by code point so a surrogate pair is never cut in half.
  return Array.from(trimmed).slice(0, maxLength).join('');
};
