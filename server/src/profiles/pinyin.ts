/**
 * Normalizes a romanized name to `Family, Given` form.
 *
 *   "Sun JianFen"   -> "Sun, JianFen"
 *   "Sun Jian Fen"  -> "Sun, JianFen"
 *   "Sun,JianFen"   -> "Sun, JianFen"
 *   "Sun,  JianFen" -> "Sun, JianFen"
 *
 * A name that already carries a comma only has its comma spacing fixed, so
 * normalizing twice gives the same result.
 */
export function normalizePinyin(name: string | null): string | null {
  if (name === null) return null;
  const spaced = name.trim().replace(/,\s*/g, ', ');
  if (spaced.includes(',')) return spaced;
  if (!spaced.includes(' ')) return spaced;

  const [family, ...given] = spaced.split(' ').filter((part) => part.length > 0);
  if (given.length === 0) return spaced;
  return `${family}, ${given.join('')}`;
}
