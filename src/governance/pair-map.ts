import { PAIR_SEPARATOR as SEPARATOR } from '../types/index.js';
import { clampSigned } from '../utils/clamp.js';

/** Order-independent key for an unordered pair. Names never contain the separator. */
export function pairKey(a: string, b: string): string {
  if (a.includes(SEPARATOR) || b.includes(SEPARATOR)) {
    throw new RangeError(`Pair names must not contain "${SEPARATOR}": ${a}, ${b}`);
  }
  return a <= b ? `${a}${SEPARATOR}${b}` : `${b}${SEPARATOR}${a}`;
}

export function splitPairKey(key: string): [string, string] | null {
  const index = key.indexOf(SEPARATOR);
  if (index <= 0 || index === key.length - 1 || key.includes(SEPARATOR, index + 1)) return null;
  return [key.slice(0, index), key.slice(index + 1)];
}

/** Code-unit ordering, independent of the host locale. */
export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Sparse symmetric scalar store in [-1, 1]. Missing pairs and self pairs read
 * as 0; zero values are not stored.
 */
export class SymmetricPairMap {
  private readonly values = new Map<string, number>();

  get(a: string, b: string): number {
    if (a === b) return 0;
    return this.values.get(pairKey(a, b)) ?? 0;
  }

  set(a: string, b: string, value: number): number {
    if (a === b) return 0;
    const clamped = clampSigned(value);
    const key = pairKey(a, b);
    if (clamped === 0) {
      this.values.delete(key);
    } else {
      this.values.set(key, clamped);
    }
    return clamped;
  }

  adjust(a: string, b: string, delta: number): number {
    return this.set(a, b, this.get(a, b) + delta);
  }

  /** Multiply every value by factor; returns the number of pairs touched. */
  scale(factor: number): number {
    let touched = 0;
    for (const [key, value] of [...this.values]) {
      const next = clampSigned(value * factor);
      if (next === 0) {
        this.values.delete(key);
      } else {
        this.values.set(key, next);
      }
      touched++;
    }
    return touched;
  }

  get size(): number {
    return this.values.size;
  }

  entries(): Array<[string, string, number]> {
    const result: Array<[string, string, number]> = [];
    for (const [key, value] of this.values) {
      const pair = splitPairKey(key);
      if (pair) result.push([pair[0], pair[1], value]);
    }
    return result.sort((x, y) => compareKeys(pairKey(x[0], x[1]), pairKey(y[0], y[1])));
  }

  clone(): SymmetricPairMap {
    const copy = new SymmetricPairMap();
    for (const [key, value] of this.values) {
      copy.values.set(key, value);
    }
    return copy;
  }

  replaceWith(other: SymmetricPairMap): void {
    this.values.clear();
    for (const [key, value] of other.values) {
      this.values.set(key, value);
    }
  }

  toJSON(): Record<string, number> {
    const out: Record<string, number> = {};
    for (const [a, b, value] of this.entries()) {
      out[pairKey(a, b)] = value;
    }
    return out;
  }

  static fromJSON(data: Record<string, number>): SymmetricPairMap {
    const map = new SymmetricPairMap();
    for (const [key, value] of Object.entries(data)) {
      const pair = splitPairKey(key);
      if (pair) map.set(pair[0], pair[1], value);
    }
    return map;
  }
}
