/** Canonical form used to merge entity mentions across sections and documents. */
export function normalizeLabel(label: string): string {
  const collapsed = label
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s-]/gu, ' ')
    .replace(/[\s-]+/g, ' ')
    .trim();

  return collapsed
    .split(' ')
    .map((word) => (word.length > 3 && word.endsWith('s') && !word.endsWith('ss') ? word.slice(0, -1) : word))
    .join(' ');
}

export function nodeIdFor(label: string): string {
  return `n:${normalizeLabel(label).replace(/ /g, '-')}`;
}

/** Code-unit ordering of ids, independent of locale. */
export function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
