import type { ResolvedBridgeConfig } from './config';
import type { ByteMask, Word } from './types';

// Lane geometry the decomposer needs; a resolved config satisfies it.
export type LaneGeometry = Pick<ResolvedBridgeConfig, 'laneCount' | 'laneBits' | 'bytesPerLane' | 'laneWidth' | 'laneDataMask' | 'byteEnable' | 'chipCount'>;

const laneByteMask = (geo: LaneGeometry): number => (1 << geo.bytesPerLane) - 1;

// Mask bits belonging to one lane, shifted down to bit 0.
export function laneBitsOf(mask: ByteMask, lane: number, geo: LaneGeometry): number {
  return (mask >>> (lane * geo.bytesPerLane)) & laneByteMask(geo);
}

// Lowest lane with at least one valid byte. An empty mask yields lane 0.
export function selectLane(mask: ByteMask, geo: LaneGeometry): number {
  for (let lane = 0; lane < geo.laneCount; lane++) {
    if (laneBitsOf(mask, lane, geo) !== 0) return lane;
  }
  return 0;
}

// Clears the bytes of the selected lane; every other lane is untouched.
export function nextMask(mask: ByteMask, geo: LaneGeometry): ByteMask {
  const lane = selectLane(mask, geo);
  return (mask & ~(laneByteMask(geo) << (lane * geo.bytesPerLane))) >>> 0;
}

export function laneCountOf(mask: ByteMask, geo: LaneGeometry): number {
  let n = 0;
  for (let lane = 0; lane < geo.laneCount; lane++) {
    if (laneBitsOf(mask, lane, geo) !== 0) n++;
  }
  return n;
}

// Wide-word address with the lane index concatenated in the low bits.
export function laneAddress(base: number, lane: number, geo: LaneGeometry): number {
  return ((base << geo.laneBits) | (lane & (geo.laneCount - 1))) >>> 0;
}

export function laneData(payload: Word, lane: number, geo: LaneGeometry): number {
  return ((payload >>> (lane * geo.laneWidth)) & geo.laneDataMask) >>> 0;
}

// Places a lane's data back into its slot of a wide word.
export function insertLaneData(word: Word, lane: number, value: number, geo: LaneGeometry): Word {
  const shift = lane * geo.laneWidth;
  const slot = (geo.laneDataMask << shift) >>> 0;
  return ((word & ~slot) | ((value & geo.laneDataMask) << shift)) >>> 0;
}

// Active-low byte enables for the valid bytes of a lane.
export function laneByteEnable(mask: ByteMask, lane: number, geo: LaneGeometry): number {
  return ~laneBitsOf(mask, lane, geo) & laneByteMask(geo);
}

export interface LaneSelect {
  ceN: number;
  beN: number | null;
}

// Chips with byte-enable pins get one CE plus per-byte BE; otherwise each byte is
// its own 8-bit chip and the byte enables become the chip enables.
export function laneSelect(mask: ByteMask, lane: number, geo: LaneGeometry): LaneSelect {
  const be = laneByteEnable(mask, lane, geo);
  if (geo.byteEnable) return { ceN: 0, beN: be };
  return { ceN: be, beN: null };
}
