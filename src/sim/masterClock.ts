export class MasterClock {
  private elapsed = 0;

  constructor(private stepTick: () => void) {}

  get ticks(): number { return this.elapsed; }

  run(ticks: number): void {
    const n = ticks | 0;
    for (let i = 0; i < n; i++) this.advance();
  }

  // Steps until `done` holds (checked before each edge). Returns the edges taken.
  runUntil(done: () => boolean, maxTicks = 10000): number {
    let n = 0;
    while (!done()) {
      if (n >= maxTicks) throw new Error(`[CLOCK] condition not reached within ${maxTicks} ticks`);
      this.advance();
      n++;
    }
    return n;
  }

  private advance(): void {
    this.stepTick();
    this.elapsed++;
  }
}
