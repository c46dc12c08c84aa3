/**
 * Name similarity as a Levenshtein ratio in [0, 100].
 *
 * ratio = round(100 × (1 − distance / max(len))) over trimmed, lower-cased,
 * whitespace-collapsed names. Two empty names score 0.
 */

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const curr = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    prev = curr;
  }
  return prev[b.length];
}

function canonicalName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function nameSimilarity(a: string, b: string): number {
  const left = canonicalName(a);
  const right = canonicalName(b);
  const longest = Math.max(left.length, right.length);
  if (longest === 0) return 0;
  return Math.round(100 * (1 - levenshtein(left, right) / longest));
}
