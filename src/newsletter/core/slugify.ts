/**
 * Convert text to a filesystem-safe slug.
 */
export function slugify(text: string, maxLength = 80): string {
  return text
    .toLowerCase()
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "") // strip diacritics
    .replace(/[_\s]+/g, "-") // spaces/underscores to hyphens first
    .replace(/[^a-z0-9-]/g, "") // remove non-alphanumeric
    .replace(/-+/g, "-") // collapse multiple hyphens
    .replace(/^-|-$/g, "") // trim leading/trailing hyphens
    .slice(0, maxLength)
    .replace(/-$/, ""); // trim trailing hyphen after slice
}

/**
 * Graph message ids are long base64 strings; keep a readable, stable prefix
 * made only of filename-safe characters.
 */
export function messageSlug(messageId: string, maxLength = 16): string {
  const safe = messageId.replace(/[^A-Za-z0-9]/g, "").slice(-maxLength);
  return safe || "message";
}
