import { BridgePhase, type ChipFrame, type Word } from '../bridge/types';
import { fnv1a32Words, toHex32 } from '../utils/hash';

export interface TraceEntry {
  tick: number;
  reset: boolean;
  phase: BridgePhase;
  stall: boolean;
  ack: boolean;
  accepted: boolean;
  readData: Word;
  chip: ChipFrame;
  dataBus: number; // resolved chip data bus after the edge
}

const PHASES = Object.values(BridgePhase);

const hex = (v: number, width: number): string => (v >>> 0).toString(16).padStart(width, '0');

export function formatTraceLine(e: TraceEntry): string {
  const c = e.chip;
  return [
    `t=${String(e.tick).padStart(5, '0')}`,
    (e.reset ? 'RESET' : e.phase).padEnd(15),
    `stall=${e.stall ? 1 : 0}`,
    `ack=${e.ack ? 1 : 0}`,
    `addr=${hex(c.address, 6)}`,
    `dout=${c.driveData ? hex(c.dataOut, 8) : 'zzzzzzzz'}`,
    `ce=${hex(c.ceN, 1)}`,
    `oe=${c.oeN}`,
    `we=${c.weN}`,
    `be=${c.beN === null ? '-' : hex(c.beN, 1)}`,
    `bus=${hex(e.dataBus, 8)}`,
    `rd=${hex(e.readData, 8)}`,
  ].join(' ');
}

function entryWords(e: TraceEntry): number[] {
  const c = e.chip;
  const flags = (e.stall ? 1 : 0)
    | (e.ack ? 2 : 0)
    | (e.accepted ? 4 : 0)
    | (c.driveData ? 8 : 0)
    | (c.oeN << 4)
    | (c.weN << 5)
    | (e.reset ? 64 : 0);
  return [e.tick, PHASES.indexOf(e.phase), flags, c.address, c.dataOut, c.ceN, c.beN ?? 0xffffffff, e.readData, e.dataBus];
}

// Stable hash of a whole run; two runs of the same program must agree.
export function traceFingerprint(trace: readonly TraceEntry[]): string {
  const words: number[] = [];
  for (const e of trace) words.push(...entryWords(e));
  return toHex32(fnv1a32Words(words));
}
