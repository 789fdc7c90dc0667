/** Single-line preview, at most `max` code points plus an ellipsis. */
export function previewText(s: string | undefined, max = 80): string {
  const flat = (s ?? '').replace(/\s+/g, ' ').trim();
  const chars = [...flat];
  return chars.length <= max ? flat : `${chars.slice(0, max).join('')}…`;
}

/** Length in code points. */
export function charLength(s: string): number {
  return [...s].length;
}
