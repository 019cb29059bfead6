/**
 * Sequential id source owned by a world. Ids start at 0 and are never reused.
 */
export class IdGenerator {
  private nextValue: number;

  constructor(start = 0) {
    this.nextValue = start;
  }

  next(): number {
    return this.nextValue++;
  }
}
