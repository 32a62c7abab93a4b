import type { Row } from "./types";

function fromObject(value: object): string {
  if ("link" in value && typeof value.link === "string") {
    return value.link.trim();
  }
  if ("text" in value && typeof value.text === "string") {
    return value.text.trim();
  }
  return JSON.stringify(value);
}

/**
 * Reduces an identity cell to its URL. Remote sheets hand URL cells back as
 * rich-link segments (`{ link }`, `[{ link, text }]`) or as their JSON text.
 */
export function extractCanonicalUrl(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed.startsWith("{") || trimmed.startsWith("[")) {
      try {
        const parsed: unknown = JSON.parse(trimmed);
        return extractCanonicalUrl(parsed);
      } catch {
        return trimmed;
      }
    }
    return trimmed;
  }
  if (Array.isArray(value)) {
    if (value.length === 0) {
      return "";
    }
    const first: unknown = value[0];
    if (typeof first === "object" && first !== null && !Array.isArray(first)) {
      return fromObject(first);
    }
    return extractCanonicalUrl(first);
  }
  if (typeof value === "object") {
    return fromObject(value);
  }
  return String(value).trim();
}

export function identityOf(row: Row, identityField: string): string {
  return extractCanonicalUrl(row[identityField]);
}
