/**
 * Seeded shuffle order over the current view.
 *
 * The order is a pure function of (seed, cycle, view ids), so a given view
 * always shuffles the same way and every cycle visits each track once.
 */

/**
 * mulberry32 PRNG, returns floats in [0, 1)
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fisher-Yates over a copy of `items`
 */
export function seededShuffle<T>(items: readonly T[], seed: number): T[] {
  const result = [...items];
  const random = createRandom(seed);
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

function mixSeed(seed: number, cycle: number): number {
  return (Math.imul(seed ^ 0x9e3779b9, 31) + Math.imul(cycle + 1, 0x85ebca6b)) >>> 0;
}

export class ShuffleOrder {
  private order: string[] = [];
  private cursor = -1;
  private cycle = 0;

  constructor(private readonly seed: number) {}

  /**
   * Regenerate for a new view. `currentId`, when it is in the view, is moved
   * to the front and becomes the cursor position.
   */
  reset(ids: readonly string[], currentId: string | null): void {
    this.cycle = 0;
    this.order = seededShuffle(ids, mixSeed(this.seed, this.cycle));
    this.cursor = -1;
    if (currentId !== null) {
      const index = this.order.indexOf(currentId);
      if (index !== -1) {
        this.order.splice(index, 1);
        this.order.unshift(currentId);
        this.cursor = 0;
      }
    }
  }

  get ids(): readonly string[] {
    return this.order;
  }

  /**
   * Next id in the cycle. When the cycle is exhausted, `wrap` starts a fresh
   * permutation; otherwise null is returned.
   */
  next(wrap: boolean): string | null {
    if (this.order.length === 0) return null;
    if (this.cursor + 1 < this.order.length) {
      this.cursor += 1;
      return this.order[this.cursor];
    }
    if (!wrap) return null;

    const last = this.order[this.order.length - 1];
    this.cycle += 1;
    this.order = seededShuffle(this.order, mixSeed(this.seed, this.cycle));
    // Never start a new cycle with the track that just ended the old one
    if (this.order.length > 1 && this.order[0] === last) {
      [this.order[0], this.order[1]] = [this.order[1], this.order[0]];
    }
    this.cursor = 0;
    return this.order[0];
  }

  previous(wrap: boolean): string | null {
    if (this.order.length === 0) return null;
    if (this.cursor > 0) {
      this.cursor -= 1;
      return this.order[this.cursor];
    }
    if (!wrap) return null;
    this.cursor = this.order.length - 1;
    return this.order[this.cursor];
  }
}
