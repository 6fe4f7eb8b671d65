/**
 * Slug and tag-list helpers
 */

export const UNTITLED_SLUG = "untitled";

/**
 * Convert a human-readable name into a filesystem-safe slug.
 * Lowercases, turns whitespace runs into hyphens, strips everything that is not
 * a letter, digit, underscore or hyphen, then trims hyphens.
 */
export function slugify(text: string): string {
  const slug = text
    .toLowerCase()
    .replace(/\s+/g, "-")
    .replace(/[^\p{L}\p{N}_-]/gu, "")
    .replace(/^-+|-+$/g, "");
  return slug || UNTITLED_SLUG;
}

/**
 * "graph-neural_networks" -> "Graph Neural Networks"
 */
export function humanizeSlug(slug: string): string {
  return slug
    .replace(/[-_]+/g, " ")
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

/**
 * Split a comma-separated LLM answer into slugified, de-duplicated tags.
 * Order of first appearance is preserved.
 */
export function parseTagList(raw: string): string[] {
  const seen = new Set<string>();
  for (const part of raw.split(",")) {
    const trimmed = part.trim();
    if (!trimmed) continue;
    seen.add(slugify(trimmed));
  }
  return [...seen];
}

/**
 * Permissive tokenizer for reconciliation answers: drops every character other
 * than alphanumerics, hyphens and commas, then splits on commas.
 */
export function tokenizeTagAnswer(raw: string): string[] {
  const pruned = raw.replace(/[^\p{L}\p{N},-]/gu, "");
  return pruned
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * True when both lists hold the same tags, ignoring order and duplicates
 */
export function sameTagSet(a: readonly string[], b: readonly string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  if (left.size !== right.size) return false;
  for (const tag of left) {
    if (!right.has(tag)) return false;
  }
  return true;
}
