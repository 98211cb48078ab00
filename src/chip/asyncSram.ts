import type { LaneGeometry } from '../bridge/decomposer';
import type { Byte, ChipFrame, Word } from '../bridge/types';

export interface ChipResponse {
  data: number;      // value on the chip's data pins
  driveMask: number; // data bits the chip is actually driving
}

export type SramGeometry = LaneGeometry & { readonly addressWidth: number; readonly dataWidth: number };

// Asynchronous SRAM behind the chip-side lines, possibly several 8-bit parts sharing
// one address bus. Storage is little-endian by wide word, so byte i of wide word w
// lives at w * bytesPerWord + i whatever the lane organisation.
export class AsyncSram {
  mem: Uint8Array;
  contentions = 0; // edges where the chip and the bridge drove the data bus together
  writes = 0;      // edges with an effective write strobe

  private readonly bytesPerWord: number;

  constructor(private readonly geo: SramGeometry, size?: number) {
    this.bytesPerWord = geo.dataWidth / 8;
    this.mem = new Uint8Array(size ?? 2 ** geo.addressWidth * this.bytesPerWord);
  }

  read8(addr: number): Byte {
    return this.mem[addr % this.mem.length];
  }

  write8(addr: number, value: Byte): void {
    this.mem[addr % this.mem.length] = value & 0xff;
  }

  peekWord(wordAddress: number): Word {
    let v = 0;
    for (let i = this.bytesPerWord - 1; i >= 0; i--) v = (v * 256) + this.read8(wordAddress * this.bytesPerWord + i);
    return v >>> 0;
  }

  pokeWord(wordAddress: number, value: Word): void {
    for (let i = 0; i < this.bytesPerWord; i++) this.write8(wordAddress * this.bytesPerWord + i, (value >>> (8 * i)) & 0xff);
  }

  // Bit per lane byte that the current CE/BE lines select.
  enabledBytes(frame: ChipFrame): number {
    const laneBytes = (1 << this.geo.bytesPerLane) - 1;
    if (this.geo.byteEnable) {
      if ((frame.ceN & 1) !== 0) return 0;
      return ~(frame.beN ?? 0) & laneBytes;
    }
    return ~frame.ceN & laneBytes;
  }

  // Applies one edge worth of the chip-side lines: stores while WE is low and
  // drives the selected bytes while OE is low.
  respond(frame: ChipFrame): ChipResponse {
    const enabled = this.enabledBytes(frame);
    const base = frame.address * this.geo.bytesPerLane;
    if (enabled === 0) return { data: 0, driveMask: 0 };

    if (frame.weN === 0) {
      if (frame.driveData) {
        for (let b = 0; b < this.geo.bytesPerLane; b++) {
          if ((enabled >>> b) & 1) this.write8(base + b, (frame.dataOut >>> (8 * b)) & 0xff);
        }
        this.writes++;
      }
      return { data: 0, driveMask: 0 };
    }

    if (frame.oeN === 0) {
      let data = 0;
      let driveMask = 0;
      for (let b = 0; b < this.geo.bytesPerLane; b++) {
        if (((enabled >>> b) & 1) === 0) continue;
        data = (data | (this.read8(base + b) << (8 * b))) >>> 0;
        driveMask = (driveMask | (0xff << (8 * b))) >>> 0;
      }
      if (frame.driveData) this.contentions++;
      return { data, driveMask };
    }
    return { data: 0, driveMask: 0 };
  }
}
