import { minBy, uniq } from 'es-toolkit';

export type DigitPair = readonly [number, number];

/**
 * Digit to the digits it is confused with, pairs applied both ways
 */
export function confusionTable(
  pairs: readonly DigitPair[],
): Map<string, string[]> {
  const table = new Map<string, string[]>();
  const add = (from: number, to: number) => {
    const key = String(from);
    table.set(key, uniq([...(table.get(key) ?? []), String(to)]));
  };
  for (const [a, b] of pairs) {
    add(a, b);
    add(b, a);
  }
  return table;
}

/**
 * The identifier itself plus every number reachable by replacing one digit
 * with a confusable one. Substitutions that would add a leading zero are
 * skipped.
 */
export function digitSubstitutionCandidates(
  identifier: number,
  pairs: readonly DigitPair[],
): number[] {
  const table = confusionTable(pairs);
  const digits = String(identifier);
  const candidates = [identifier];

  for (let index = 0; index < digits.length; index++) {
    for (const replacement of table.get(digits[index]) ?? []) {
      if (index === 0 && replacement === '0' && digits.length > 1) {
        continue;
      }
      const substituted =
        digits.slice(0, index) + replacement + digits.slice(index + 1);
      candidates.push(Number.parseInt(substituted, 10));
    }
  }

  return uniq(candidates);
}

/**
 * Candidate equal to `expected`, else the closest one within `window`
 * (smaller wins a tie)
 */
export function chooseCandidate(
  candidates: readonly number[],
  expected: number,
  window: number,
): number | undefined {
  if (candidates.includes(expected)) {
    return expected;
  }
  const inWindow = [...candidates]
    .filter((candidate) => Math.abs(candidate - expected) <= window)
    .sort((a, b) => a - b);
  return minBy(inWindow, (candidate) => Math.abs(candidate - expected));
}
