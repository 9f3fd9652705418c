import { createHash } from "node:crypto";

export function normalizeAgentId(input: string): string {
  return input
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 48);
}

/**
 * Filesystem-safe stem for a caller-chosen string: a readable ASCII slug plus a short sha256
 * of the exact trimmed value, so distinct values never share a stem.
 */
export function slugWithDigest(value: string, fallback: string): string {
  const trimmed = value.trim();
  const slug = trimmed
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 40)
    .replace(/-+$/, "");
  const digest = createHash("sha256").update(trimmed).digest("hex").slice(0, 8);
  return `${slug || fallback}-${digest}`;
}

export function previewForLog(text: string, maxLength = 160): string {
  const normalized = text.replace(/\s+/g, " ").trim();
  if (normalized.length <= maxLength) return normalized;
  return `${normalized.slice(0, maxLength)}...`;
}
