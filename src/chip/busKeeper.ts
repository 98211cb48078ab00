import type { ChipFrame } from '../bridge/types';
import type { ChipResponse } from './asyncSram';

// Tri-state data bus with keeper: undriven bits hold their last driven value.
export class BusKeeper {
  private value = 0;

  constructor(private readonly width: number) {}

  reset(): void { this.value = 0; }

  read(): number { return this.value; }

  resolve(frame: ChipFrame, chip: ChipResponse): number {
    const all = this.width >= 32 ? 0xffffffff : ((1 << this.width) - 1) >>> 0;
    if (frame.driveData) {
      this.value = (frame.dataOut & all) >>> 0;
    } else {
      this.value = ((this.value & ~chip.driveMask) | (chip.data & chip.driveMask)) >>> 0;
    }
    this.value = (this.value & all) >>> 0;
    return this.value;
  }
}
