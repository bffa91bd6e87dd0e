import { NOT_FOUND } from "./extract";
import { squash } from "./utils";

const STRICT_EMAIL = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const SEPARATOR = ", ";

const GENERIC_NAMES = new Set(["contact us", "contact", "home", "enquiries", "about us", "enquiry"]);
const UNKNOWN_NAME = "Unknown Restaurant";

function splitCandidates(joined: string): string[] | null {
  if (!joined.trim() || joined === NOT_FOUND) return null;
  return joined.split(SEPARATOR);
}

function joinUnique(values: string[]): string {
  const unique = Array.from(new Set(values));
  return unique.length ? unique.join(SEPARATOR) : NOT_FOUND;
}

export function cleanEmail(joined: string): string {
  const candidates = splitCandidates(joined);
  if (!candidates) return NOT_FOUND;

  const kept: string[] = [];
  for (const raw of candidates) {
    const email = raw.replace(/[^a-zA-Z0-9@._-]/g, "");
    const at = email.lastIndexOf("@");
    if (at >= 0 && email.slice(at + 1).includes(".")) {
      kept.push(email.toLowerCase());
    }
  }
  return joinUnique(kept);
}

export function cleanPhone(joined: string): string {
  const candidates = splitCandidates(joined);
  if (!candidates) return NOT_FOUND;

  const kept: string[] = [];
  for (const raw of candidates) {
    const phone = raw.replace(/[^\d+\-\s]/g, "").trim();
    const digits = phone.replace(/\D/g, "").length;
    if (digits >= 7 && digits <= 15) kept.push(phone);
  }
  return joinUnique(kept);
}

/**
 * Host label of a website, capitalized: "https://www.best-bites.sg/menu" gives "Bestbites".
 * Empty when nothing alphanumeric is left.
 */
export function domainLabel(website: string): string {
  const host = website.replace(/^https?:\/\//i, "").replace(/^www\./i, "");
  const label = host.split(/[./]/)[0].replace(/[^a-zA-Z0-9]/g, "");
  return label ? label[0].toUpperCase() + label.slice(1) : "";
}

/**
 * Display name from a search-result title. Everything from the first "|" or "-" on is
 * dropped; generic page titles like "Contact Us" fall back to a name built from the domain.
 */
export function cleanName(title: string, website: string): string {
  const cut = title.search(/[|-]/);
  const name = squash(cut >= 0 ? title.slice(0, cut) : title);

  if (GENERIC_NAMES.has(name.toLowerCase())) {
    const label = domainLabel(website);
    return label ? `${label} Restaurant` : UNKNOWN_NAME;
  }
  return name || UNKNOWN_NAME;
}

export function validateEmail(s: string): boolean {
  return s === NOT_FOUND || STRICT_EMAIL.test(s);
}

export function validateUrl(s: string): boolean {
  if (!s || s === NOT_FOUND) return false;
  return s.startsWith("http://") || s.startsWith("https://");
}

export function fromSentinel(s: string): string | undefined {
  return !s.trim() || s === NOT_FOUND ? undefined : s;
}

export function toSentinel(value: string | undefined): string {
  return value ?? NOT_FOUND;
}
