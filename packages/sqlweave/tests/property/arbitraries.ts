/**
 * Shared Arbitrary Generators for Property-Based Tests
 */
import fc from "fast-check";

// ============================================================
// Value Arbitraries
// ============================================================

/**
 * Short strings over a three-letter alphabet, so substrings recur often.
 */
export const smallAlphabetStringArb = fc.string({
  unit: fc.constantFrom("a", "b", "c"),
  maxLength: 6,
});

/**
 * Integers whose sums stay well inside the safe range.
 */
export const smallIntArb = fc.integer({ min: -1000, max: 1000 });

export const nonEmptyIntListArb = fc.array(smallIntArb, {
  minLength: 1,
  maxLength: 8,
});

/**
 * Lists of non-empty int lists, for per-item aggregates.
 */
export const nestedIntListArb = fc.array(nonEmptyIntListArb, {
  minLength: 1,
  maxLength: 4,
});

// ============================================================
// Graph Arbitraries
// ============================================================

/**
 * Node ids 1..6, so random edges often form cycles.
 */
export const nodeIdArb = fc.integer({ min: 1, max: 6 });

export const edgeArb: fc.Arbitrary<readonly [number, number]> = fc.tuple(
  nodeIdArb,
  nodeIdArb,
);

export const edgeListArb = fc.array(edgeArb, { minLength: 0, maxLength: 12 });

// ============================================================
// Reference Implementations
// ============================================================

/**
 * Nodes reachable from `start`, including the start nodes.
 */
export function reachable(
  edges: readonly (readonly [number, number])[],
  start: readonly number[],
): number[] {
  const seen = new Set(start);
  const queue = [...seen];
  for (let node = queue.shift(); node !== undefined; node = queue.shift()) {
    for (const [src, dst] of edges) {
      if (src === node && !seen.has(dst)) {
        seen.add(dst);
        queue.push(dst);
      }
    }
  }
  return [...seen].sort((a, b) => a - b);
}

/**
 * `id:rank` for every walk of at most `maxRank` edges, sorted.
 */
export function walks(
  edges: readonly (readonly [number, number])[],
  start: readonly number[],
  maxRank: number,
): string[] {
  const result: string[] = [];
  let frontier = [...start];
  for (let rank = 0; rank <= maxRank; rank++) {
    result.push(...frontier.map((id) => `${id}:${rank}`));
    frontier = frontier.flatMap((id) =>
      edges.filter(([src]) => src === id).map(([, dst]) => dst),
    );
  }
  return result.sort();
}

export function median(values: readonly number[]): number {
  const ordered = [...values].sort((a, b) => a - b);
  const middle = Math.floor((ordered.length - 1) / 2);
  const low = ordered[middle] ?? Number.NaN;
  const high = ordered[ordered.length - 1 - middle] ?? Number.NaN;
  return (low + high) / 2;
}
