import type { BridgeConfig } from '../bridge/config';

// Device timings in nanoseconds, as read off a datasheet.
export interface DatasheetTiming {
  readonly accessNs: number;          // address/CE access time (tAA)
  readonly outputDisableNs: number;   // OE high to data high-Z (tHZOE)
  readonly writePulseNs: number;      // WE low width (tWP)
  readonly writeRecoveryNs: number;   // WE high to next address change (tWR)
}

export type PhaseCycles = Pick<BridgeConfig, 'readActive' | 'readTurnaround' | 'writeActive' | 'writeTurnaround'>;

// Whole clock cycles covering `ns`; never less than one.
export function cyclesFor(ns: number, clockHz: number): number {
  const exact = (ns * clockHz) / 1e9;
  return Math.max(1, Math.ceil(exact - 1e-9));
}

export function timingFromDatasheet(t: DatasheetTiming, clockHz: number): PhaseCycles {
  return {
    readActive: cyclesFor(t.accessNs, clockHz),
    readTurnaround: cyclesFor(t.outputDisableNs, clockHz),
    writeActive: cyclesFor(t.writePulseNs, clockHz),
    writeTurnaround: cyclesFor(t.writeRecoveryNs, clockHz),
  };
}

const FAST_X16: DatasheetTiming = { accessNs: 10, outputDisableNs: 5, writePulseNs: 8, writeRecoveryNs: 5 };
const SLOW_X8: DatasheetTiming = { accessNs: 55, outputDisableNs: 20, writePulseNs: 40, writeRecoveryNs: 10 };

export const PRESETS: Readonly<Record<string, BridgeConfig>> = {
  // one 16-bit part with UB/LB byte enables on a 32-bit bus
  'x16-10ns@100MHz': {
    addressWidth: 17,
    dataWidth: 32,
    laneWidth: 16,
    byteEnable: true,
    ...timingFromDatasheet(FAST_X16, 100e6),
  },
  // four 8-bit parts, one per byte, each with its own chip enable
  'x8-55ns@50MHz': {
    addressWidth: 15,
    dataWidth: 32,
    laneWidth: 32,
    byteEnable: false,
    ...timingFromDatasheet(SLOW_X8, 50e6),
  },
  // same parts, but multiplexed as four lanes on one 8-bit data bus
  'x8-55ns@50MHz-narrow': {
    addressWidth: 15,
    dataWidth: 32,
    laneWidth: 8,
    byteEnable: false,
    fastRead: true,
    ...timingFromDatasheet(SLOW_X8, 50e6),
  },
};

export function presetNames(): string[] {
  return Object.keys(PRESETS);
}
