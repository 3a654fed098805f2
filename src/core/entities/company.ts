import { createHash } from "node:crypto";

/**
 * One research subject. Loaded once and never mutated afterwards.
 */
export type CompanyEntity = {
  readonly id: string;
  readonly name: string;
  readonly domain: string;
  readonly metadata: Readonly<Record<string, string>>;
};

/**
 * Reduces a website value to a bare lowercase host so ids and fetch targets stay stable
 * across "https://www.acme.com/about" and "acme.com".
 */
export const canonicalizeDomain = (raw: string): string => {
  const trimmed = raw.trim().toLowerCase();
  if (!trimmed) {
    return "";
  }

  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//.test(trimmed)
    ? trimmed
    : `https://${trimmed}`;

  try {
    return new URL(withScheme).hostname.replace(/^www\./, "");
  } catch {
    return "";
  }
};

export const slugify = (value: string): string =>
  value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");

/**
 * Id for a company known only by name. A name with nothing to slug (e.g. written in kana or
 * Cyrillic) gets a hash of its normalized form, so distinct names never share an id.
 */
export const entityIdFromName = (name: string): string => {
  const slug = slugify(name);
  if (slug) {
    return slug;
  }

  const normalized = name.normalize("NFKC").trim().toLowerCase().replace(/\s+/g, " ");
  return `name-${createHash("sha256").update(normalized).digest("hex").slice(0, 16)}`;
};
