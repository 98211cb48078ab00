export type Byte = number; // 0..255
export type Word = number; // 0..0xFFFFFFFF, one wide bus word
export type ByteMask = number; // bit i set => byte i of the wide word participates

export enum BridgePhase {
  Idle = 'Idle',
  Read = 'Read',
  ReadTurnaround = 'ReadTurnaround',
  WriteActive = 'WriteActive',
  WriteTurnaround = 'WriteTurnaround',
}

// Latched bus request. Never mutated after acceptance.
export interface BusRequest {
  readonly address: number;
  readonly data: Word;
  readonly byteMask: ByteMask;
  readonly isWrite: boolean;
}

// Chip-side lines. All control lines are active-low, as on the device pins.
export interface ChipFrame {
  readonly address: number;
  readonly dataOut: number;
  readonly driveData: boolean; // false => bridge data pins are high-impedance
  readonly ceN: number;        // bit per chip-enable line
  readonly oeN: 0 | 1;
  readonly weN: 0 | 1;
  readonly beN: number | null; // bit per byte; null when the chip has no byte-enable pins
}

// Everything sampled by the bridge at a clock edge.
export interface BusInputs {
  reset: boolean;
  cycleValid: boolean;
  strobeValid: boolean;
  writeEnableIn: boolean;
  address: number;
  writeData: Word;
  byteSelectMask: ByteMask;
  chipDataIn: number; // data pins as seen at the chip boundary
}

export interface BusOutputs {
  stall: boolean;
  ack: boolean;
  readData: Word;
  accepted: boolean; // monitor: the presented request was latched at this edge
}

export interface BridgeOutputs extends BusOutputs {
  phase: BridgePhase;
  chip: ChipFrame; // after the output latency stage
}

export interface IClocked<I, O> {
  reset(): void;
  tick(input: I): O; // advance exactly one clock edge
}

export const IDLE_INPUTS: Readonly<BusInputs> = {
  reset: false,
  cycleValid: false,
  strobeValid: false,
  writeEnableIn: false,
  address: 0,
  writeData: 0,
  byteSelectMask: 0,
  chipDataIn: 0,
};
