const PAGE_MARKER_RE = /^Page (\d+)$/;

/** Page number carried by a "Page <n>" comment, or null for any other comment. */
export function parsePageMarker(text: string): number | null {
  const m = text.match(PAGE_MARKER_RE);
  if (!m) return null;
  return Number(m[1]);
}
