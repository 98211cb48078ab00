// Fixed-latency stage: the value read out is the one pushed `depth` ticks earlier.
// Depth 0 is a plain wire.
export class DelayLine<T> {
  private readonly slots: T[];
  private head = 0;

  constructor(readonly depth: number, private readonly initial: T) {
    this.slots = new Array<T>(Math.max(0, depth | 0)).fill(initial);
  }

  reset(): void {
    this.slots.fill(this.initial);
    this.head = 0;
  }

  push(value: T): T {
    if (this.slots.length === 0) return value;
    const out = this.slots[this.head];
    this.slots[this.head] = value;
    this.head = (this.head + 1) % this.slots.length;
    return out;
  }
}
