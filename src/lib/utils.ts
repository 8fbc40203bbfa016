import path from "path";
import { SLUG_FALLBACK } from "./constants";

/**
 * Derives a path- and URL-safe slug: lowercase `[a-z0-9-]` only, with
 * separator runs (space, hyphen, underscore, dot) collapsed to one hyphen.
 * Diacritics are folded to their base letter; any other character is dropped.
 * Not collision-proof: "Game Boy" and "game_boy" share a slug.
 */
export const slugify = (text: string): string => {
  const slug = text
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[ \-_.]/g, "-")
    .replace(/[^a-z0-9-]/g, "")
    .replace(/-{2,}/g, "-")
    .replace(/^-+|-+$/g, "");

  return slug || SLUG_FALLBACK;
};

export const isHidden = (name: string): boolean => name.startsWith(".");

// Case-insensitive, code-unit order (no locale collation)
export const compareNames = (a: string, b: string): number => {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
};

export const hasExtension = (fileName: string, extensions: readonly string[]): boolean =>
  extensions.includes(path.extname(fileName).toLowerCase());

// "Contra.zip" -> "Contra"
export const fileStem = (fileName: string): string => path.parse(fileName).name;

export const toPosixPath = (value: string): string => value.split(path.sep).join("/");

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);

// Two-space JSON with every non-ASCII code unit written as a `\uXXXX` escape
export const stringifyAsciiJson = (data: unknown): string =>
  JSON.stringify(data, null, 2).replace(
    /[\u0080-\uffff]/g,
    (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`,
  );
