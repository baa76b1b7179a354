import seedrandom from 'seedrandom';
import { Point2 } from '../types';

/**
 * Seeded pseudo-random source. One instance per generation run, handed to the
 * motion planner explicitly; the engine never touches Math.random.
 */
export class SeededRandom {
  private readonly next: () => number;

  constructor(readonly seed: number) {
    this.next = seedrandom(String(seed));
  }

  /** Uniform value in [0, 1) */
  random(): number {
    return this.next();
  }

  uniform(min: number, max: number): number {
    return min + (max - min) * this.random();
  }

  /** Uniform integer in [min, max], both ends included */
  integer(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new Error('Cannot pick from an empty list');
    }
    return items[this.integer(0, items.length - 1)];
  }

  /** Uniform point inside a disc of the given radius around the origin */
  inDisc(radius: number): Point2 {
    const angle = this.random() * Math.PI * 2;
    const distance = radius * Math.sqrt(this.random());
    return { x: Math.cos(angle) * distance, y: Math.sin(angle) * distance };
  }
}
