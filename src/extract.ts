export const NOT_FOUND = "-";

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
const PHONE_REGEX = /\+?\d[\d\s-]{7,}\d/g;

/** Every email-looking substring in order of appearance, or ["-"]. */
export function extractEmails(text: string): string[] {
  const found = text.match(EMAIL_REGEX);
  return found ? [...found] : [NOT_FOUND];
}

/** Every phone-looking run of digits, spaces and hyphens in order of appearance, or ["-"]. */
export function extractPhones(text: string): string[] {
  const found = text.match(PHONE_REGEX);
  return found ? [...found] : [NOT_FOUND];
}

export function hasMatches(extracted: string[]): boolean {
  return !(extracted.length === 1 && extracted[0] === NOT_FOUND);
}
