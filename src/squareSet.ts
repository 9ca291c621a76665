import { Square } from './types';

const WORD_BITS = 27;
const WORD_MASK = 0x7ffffff;

const popcnt32 = (n: number): number => {
  n = n - ((n >>> 1) & 0x55555555);
  n = (n & 0x33333333) + ((n >>> 2) & 0x33333333);
  return Math.imul((n + (n >>> 4)) & 0x0f0f0f0f, 0x01010101) >> 24;
};

const bsf = (n: number): number => 31 - Math.clz32(n & -n);

const msb = (n: number): number => 31 - Math.clz32(n);

const wordOf = (square: Square): number => Math.floor(square / WORD_BITS);

const bitOf = (square: Square): number => 1 << square % WORD_BITS;

// one bit on every rank of a word: files share a word three at a time
const RANK_PATTERN = 1 | (1 << 9) | (1 << 18);

/**
 * An immutable set of the 81 squares, three files per word.
 */
export class SquareSet implements Iterable<Square> {
  readonly lo: number;
  readonly mid: number;
  readonly hi: number;

  constructor(lo: number, mid: number, hi: number) {
    this.lo = lo & WORD_MASK;
    this.mid = mid & WORD_MASK;
    this.hi = hi & WORD_MASK;
  }

  static fromSquare(square: Square): SquareSet {
    const word = wordOf(square);
    const bit = bitOf(square);
    return new SquareSet(word === 0 ? bit : 0, word === 1 ? bit : 0, word === 2 ? bit : 0);
  }

  /** 1..9 */
  static fromFile(file: number): SquareSet {
    const bits = 0x1ff << (((file - 1) % 3) * 9);
    const word = Math.floor((file - 1) / 3);
    return new SquareSet(word === 0 ? bits : 0, word === 1 ? bits : 0, word === 2 ? bits : 0);
  }

  /** 1..9 */
  static fromRank(rank: number): SquareSet {
    const bits = RANK_PATTERN << (rank - 1);
    return new SquareSet(bits, bits, bits);
  }

  static empty(): SquareSet {
    return new SquareSet(0, 0, 0);
  }

  static full(): SquareSet {
    return new SquareSet(WORD_MASK, WORD_MASK, WORD_MASK);
  }

  complement(): SquareSet {
    return new SquareSet(~this.lo, ~this.mid, ~this.hi);
  }

  xor(other: SquareSet): SquareSet {
    return new SquareSet(this.lo ^ other.lo, this.mid ^ other.mid, this.hi ^ other.hi);
  }

  union(other: SquareSet): SquareSet {
    return new SquareSet(this.lo | other.lo, this.mid | other.mid, this.hi | other.hi);
  }

  intersect(other: SquareSet): SquareSet {
    return new SquareSet(this.lo & other.lo, this.mid & other.mid, this.hi & other.hi);
  }

  diff(other: SquareSet): SquareSet {
    return new SquareSet(this.lo & ~other.lo, this.mid & ~other.mid, this.hi & ~other.hi);
  }

  intersects(other: SquareSet): boolean {
    return this.intersect(other).nonEmpty();
  }

  isDisjoint(other: SquareSet): boolean {
    return this.intersect(other).isEmpty();
  }

  supersetOf(other: SquareSet): boolean {
    return other.diff(this).isEmpty();
  }

  subsetOf(other: SquareSet): boolean {
    return this.diff(other).isEmpty();
  }

  equals(other: SquareSet): boolean {
    return this.lo === other.lo && this.mid === other.mid && this.hi === other.hi;
  }

  size(): number {
    return popcnt32(this.lo) + popcnt32(this.mid) + popcnt32(this.hi);
  }

  isEmpty(): boolean {
    return this.lo === 0 && this.mid === 0 && this.hi === 0;
  }

  nonEmpty(): boolean {
    return !this.isEmpty();
  }

  has(square: Square): boolean {
    const bit = bitOf(square);
    switch (wordOf(square)) {
      case 0:
        return (this.lo & bit) !== 0;
      case 1:
        return (this.mid & bit) !== 0;
      default:
        return (this.hi & bit) !== 0;
    }
  }

  set(square: Square, on: boolean): SquareSet {
    return on ? this.with(square) : this.without(square);
  }

  with(square: Square): SquareSet {
    return this.union(SquareSet.fromSquare(square));
  }

  without(square: Square): SquareSet {
    return this.diff(SquareSet.fromSquare(square));
  }

  toggle(square: Square): SquareSet {
    return this.xor(SquareSet.fromSquare(square));
  }

  first(): Square | undefined {
    if (this.lo !== 0) return bsf(this.lo);
    if (this.mid !== 0) return WORD_BITS + bsf(this.mid);
    if (this.hi !== 0) return 2 * WORD_BITS + bsf(this.hi);
    return;
  }

  last(): Square | undefined {
    if (this.hi !== 0) return 2 * WORD_BITS + msb(this.hi);
    if (this.mid !== 0) return WORD_BITS + msb(this.mid);
    if (this.lo !== 0) return msb(this.lo);
    return;
  }

  moreThanOne(): boolean {
    return this.size() > 1;
  }

  singleSquare(): Square | undefined {
    return this.moreThanOne() ? undefined : this.first();
  }

  *[Symbol.iterator](): Iterator<Square> {
    const words = [this.lo, this.mid, this.hi];
    for (let i = 0; i < words.length; i++) {
      let word = words[i];
      while (word !== 0) {
        const idx = bsf(word);
        word ^= 1 << idx;
        yield i * WORD_BITS + idx;
      }
    }
  }

  *reversed(): Iterable<Square> {
    const words = [this.lo, this.mid, this.hi];
    for (let i = words.length - 1; i >= 0; i--) {
      let word = words[i];
      while (word !== 0) {
        const idx = msb(word);
        word ^= 1 << idx;
        yield i * WORD_BITS + idx;
      }
    }
  }
}
