/**
 * URL slug: lowercase, keep only [a-z0-9], whitespace and hyphens, turn
 * whitespace and underscores into hyphens, collapse repeats and trim.
 * `maxLength` caps the result (CLI directory names use 50).
 */
export function slugify(text: string, maxLength?: number): string {
  const slug = text
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, "")
    .replace(/[\s_]+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");
  if (maxLength === undefined) return slug;
  return slug.slice(0, maxLength).replace(/-+$/g, "");
}
