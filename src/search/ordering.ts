import type { CandidateSequence } from './engine.js';

/** `from, from + 1, ..., to`, computed on demand. */
export function ascendingSequence(from: number, to: number): CandidateSequence<number> {
  const size = to - from + 1;
  return {
    size,
    at(index: number): number {
      if (index < 0 || index >= size) throw new RangeError(`Candidate index ${index} out of range`);
      return from + index;
    },
  };
}

/** `start, start + stride, ...` up to and including `end` when it lands on the stride. */
export function steppedSequence(start: number, end: number, stride: number): CandidateSequence<number> {
  const size = Math.floor((end - start) / stride) + 1;
  return {
    size,
    at(index: number): number {
      if (index < 0 || index >= size) throw new RangeError(`Candidate index ${index} out of range`);
      return start + index * stride;
    },
  };
}

export function fromArray<C>(items: readonly C[]): CandidateSequence<C> {
  return {
    size: items.length,
    at(index: number): C {
      const item = items[index];
      if (item === undefined) throw new RangeError(`Candidate index ${index} out of range`);
      return item;
    },
  };
}

/**
 * In-range hints first, in the order given, then every other timestamp of
 * `[from, to]` by distance to the nearest hint (ties go to the earlier one).
 * Hints outside the range are dropped. Without usable hints this is the
 * ascending sequence.
 *
 * Nothing is materialized: `at(i)` finds the distance ring holding the i-th
 * value by binary search over how many values lie within each distance.
 */
export function hintedSequence(
  from: number,
  to: number,
  hints: readonly number[],
): CandidateSequence<number> {
  const seeds: number[] = [];
  for (const hint of hints) {
    if (Number.isInteger(hint) && hint >= from && hint <= to && !seeds.includes(hint)) {
      seeds.push(hint);
    }
  }
  if (seeds.length === 0) return ascendingSequence(from, to);

  const sorted = [...seeds].sort((a, b) => a - b);
  const size = to - from + 1;

  // Values of the range within `d` of some seed, seeds included
  const coveredWithin = (d: number): number => {
    let count = 0;
    let end = -Infinity;
    for (const seed of sorted) {
      const lo = Math.max(from, seed - d, end + 1);
      const hi = Math.min(to, seed + d);
      if (hi >= lo) count += hi - lo + 1;
      end = Math.max(end, hi);
    }
    return count;
  };

  const nearest = (value: number): number => {
    let best = Infinity;
    for (const seed of sorted) best = Math.min(best, Math.abs(value - seed));
    return best;
  };

  // Values exactly `d` from their nearest seed, ascending
  const ring = (d: number): number[] => {
    const values = new Set<number>();
    for (const seed of sorted) {
      for (const value of [seed - d, seed + d]) {
        if (value >= from && value <= to && nearest(value) === d) values.add(value);
      }
    }
    return [...values].sort((a, b) => a - b);
  };

  return {
    size,
    at(index: number): number {
      if (index < 0 || index >= size) throw new RangeError(`Candidate index ${index} out of range`);
      const seed = seeds[index];
      if (seed !== undefined) return seed;

      let lo = 1;
      let hi = to - from;
      while (lo < hi) {
        const mid = lo + Math.floor((hi - lo) / 2);
        if (coveredWithin(mid) > index) hi = mid;
        else lo = mid + 1;
      }
      const value = ring(lo)[index - coveredWithin(lo - 1)];
      if (value === undefined) throw new RangeError(`Candidate index ${index} out of range`);
      return value;
    },
  };
}
