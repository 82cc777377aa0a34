import {
  EMAIL_PATTERN,
  GITHUB_MARKER,
  LATEX_SPECIAL_CHARS,
  LATEX_SPECIAL_PATTERN,
  LINKEDIN_MARKER,
  PHONE_MIN_DIGITS,
} from '../constants/latex.constants';

export type ContactKind = 'email' | 'linkedin' | 'github' | 'phone' | 'text';

function displayString(value: unknown, enclosing: ReadonlySet<unknown>): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    if (enclosing.has(value)) return '';
    const nested = new Set(enclosing).add(value);
    return value.map((item) => displayString(item, nested)).join(', ');
  }
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      // BigInt members and cycles have no JSON form.
      return String(value);
    }
  }
  return String(value);
}

/** Display string for any value; null and undefined become ''. Never throws. */
export function toDisplayString(value: unknown): string {
  return displayString(value, new Set());
}

export function escapeLatex(value: unknown): string {
  return toDisplayString(value).replace(
    LATEX_SPECIAL_PATTERN,
    (char) => LATEX_SPECIAL_CHARS[char] ?? char,
  );
}

export function isEmail(text: string): boolean {
  return text.includes('@') && EMAIL_PATTERN.test(text);
}

export function isLinkedIn(text: string): boolean {
  return text.toLowerCase().includes(LINKEDIN_MARKER);
}

export function isGitHub(text: string): boolean {
  return text.toLowerCase().includes(GITHUB_MARKER);
}

export function isPhone(text: string): boolean {
  return digitsOf(text).length >= PHONE_MIN_DIGITS;
}

/**
 * The predicates overlap; the first match in the order
 * email, linkedin, github, phone wins.
 */
export function classifyContact(text: string): ContactKind {
  if (isEmail(text)) return 'email';
  if (isLinkedIn(text)) return 'linkedin';
  if (isGitHub(text)) return 'github';
  if (isPhone(text)) return 'phone';
  return 'text';
}

export function ensureProtocol(
  url: string | null | undefined,
  protocol = 'https://',
): string {
  if (url === null || url === undefined) return '';
  if (url.startsWith('http://') || url.startsWith('https://')) return url;
  return `${protocol}${url}`;
}

export function digitsOf(text: string): string {
  return text.replace(/\D/g, '');
}
