/**
 * Date text cleanup
 */

const ICON_GLYPHS = /[⏰🕒📅]/gu;

/**
 * Strip decorative icons, collapse whitespace and trim.
 * Returns null when nothing is left.
 */
export function sanitizeDateText(raw?: string | null): string | null {
  if (!raw) return null;

  const cleaned = raw.replace(ICON_GLYPHS, '').replace(/\s+/g, ' ').trim();
  return cleaned.length > 0 ? cleaned : null;
}
