// Timing sequencer: one pure step per clock edge.
//
// The state carries the registered outputs (chip frame, stall, ack, read buffer),
// so whatever stepSequencer returns is what the pins show after the edge.
// Counters load `duration - 1` because the loading edge is itself the first cycle
// of the phase.

import type { ResolvedBridgeConfig } from './config';
import { laneAddress, laneData, insertLaneData, laneSelect, nextMask, selectLane } from './decomposer';
import { BridgePhase, type BusInputs, type BusRequest, type ByteMask, type ChipFrame, type Word } from './types';

export interface SequencerState {
  readonly phase: BridgePhase;
  readonly counter: number;
  readonly request: BusRequest | null;
  readonly residual: ByteMask;
  readonly lane: number;
  readonly frame: ChipFrame;
  readonly stall: boolean;
  readonly ack: boolean;
  readonly accepted: boolean;
  readonly readData: Word;
}

const allOnes = (bits: number): number => (1 << bits) - 1;

export function releasedFrame(cfg: ResolvedBridgeConfig, prev?: ChipFrame): ChipFrame {
  return {
    address: prev?.address ?? 0,
    dataOut: prev?.dataOut ?? 0,
    driveData: false,
    ceN: allOnes(cfg.chipCount),
    oeN: 1,
    weN: 1,
    beN: cfg.byteEnable ? allOnes(cfg.bytesPerLane) : null,
  };
}

export function initialSequencerState(cfg: ResolvedBridgeConfig): SequencerState {
  return {
    phase: BridgePhase.Idle,
    counter: 0,
    request: null,
    residual: 0,
    lane: 0,
    frame: releasedFrame(cfg),
    stall: false,
    ack: false,
    accepted: false,
    readData: 0,
  };
}

// Read lanes hold long enough for the address to reach the chip and the data to come back.
export const readHold = (cfg: ResolvedBridgeConfig): number => cfg.readActive - 1 + cfg.roundTrip;

function laneFrame(cfg: ResolvedBridgeConfig, req: BusRequest, mask: ByteMask, lane: number, prev: ChipFrame): ChipFrame {
  const sel = laneSelect(mask, lane, cfg);
  return {
    address: laneAddress(req.address, lane, cfg),
    dataOut: req.isWrite ? laneData(req.data, lane, cfg) : prev.dataOut,
    driveData: req.isWrite,
    ceN: sel.ceN,
    oeN: req.isWrite ? 1 : 0,
    weN: req.isWrite ? 0 : 1,
    beN: sel.beN,
  };
}

const requestPresent = (input: BusInputs): boolean => input.cycleValid && input.strobeValid;

function latch(cfg: ResolvedBridgeConfig, input: BusInputs): BusRequest {
  const address = input.address >>> 0;
  return {
    address: cfg.addressWidth >= 32 ? address : address % 2 ** cfg.addressWidth,
    data: input.writeData >>> 0,
    byteMask: (input.byteSelectMask & cfg.fullByteMask) >>> 0,
    isWrite: input.writeEnableIn,
  };
}

// Accepts a request and drives its first lane.
function start(cfg: ResolvedBridgeConfig, s: SequencerState, req: BusRequest): SequencerState {
  if (req.byteMask === 0) {
    // Nothing to transfer: acknowledge at once and leave the chip alone.
    return {
      ...s,
      phase: BridgePhase.Idle,
      counter: 0,
      request: null,
      residual: 0,
      frame: releasedFrame(cfg, s.frame),
      stall: false,
      ack: true,
      accepted: true,
    };
  }
  const lane = selectLane(req.byteMask, cfg);
  const base = {
    ...s,
    request: req,
    lane,
    residual: nextMask(req.byteMask, cfg),
    frame: laneFrame(cfg, req, req.byteMask, lane, s.frame),
    stall: true,
    accepted: true,
  };
  if (req.isWrite) {
    // Posted write: the bus side is released before the chip is written.
    return { ...base, phase: BridgePhase.WriteActive, counter: cfg.writeActive - 1, ack: true };
  }
  return { ...base, phase: BridgePhase.Read, counter: readHold(cfg), ack: false };
}

function stepIdle(cfg: ResolvedBridgeConfig, s: SequencerState, input: BusInputs): SequencerState {
  if (requestPresent(input)) return start(cfg, s, latch(cfg, input));
  return { ...s, frame: releasedFrame(cfg, s.frame), stall: false };
}

function stepRead(cfg: ResolvedBridgeConfig, s: SequencerState, input: BusInputs): SequencerState {
  if (s.counter > 0) return { ...s, counter: s.counter - 1 };

  const readData = insertLaneData(s.readData, s.lane, input.chipDataIn, cfg);
  const req = s.request;
  if (req !== null && s.residual !== 0) {
    const lane = selectLane(s.residual, cfg);
    return {
      ...s,
      readData,
      lane,
      frame: laneFrame(cfg, req, s.residual, lane, s.frame),
      residual: nextMask(s.residual, cfg),
      counter: readHold(cfg),
      ack: true,
    };
  }

  if (cfg.fastRead && requestPresent(input) && !input.writeEnableIn) {
    const next = latch(cfg, input);
    if (next.byteMask !== 0) {
      // Chained read: stall stays high and no idle cycle is spent.
      return { ...start(cfg, { ...s, readData }, next), ack: true };
    }
  }

  const done = { ...s, readData, request: null, frame: releasedFrame(cfg, s.frame), stall: false, ack: true };
  if (cfg.readTurnaround === 1) return { ...done, phase: BridgePhase.Idle, counter: 0 };
  return { ...done, phase: BridgePhase.ReadTurnaround, counter: cfg.readTurnaround - 2 };
}

function stepReadTurnaround(s: SequencerState): SequencerState {
  if (s.counter > 0) return { ...s, counter: s.counter - 1 };
  return { ...s, phase: BridgePhase.Idle };
}

function stepWriteActive(cfg: ResolvedBridgeConfig, s: SequencerState): SequencerState {
  if (s.counter > 0) return { ...s, counter: s.counter - 1 };
  const frame = releasedFrame(cfg, s.frame);
  if (cfg.writeTurnaround === 1 && s.residual === 0) {
    return { ...s, phase: BridgePhase.Idle, counter: 0, request: null, frame, stall: false };
  }
  return { ...s, phase: BridgePhase.WriteTurnaround, counter: cfg.writeTurnaround - 1, frame };
}

function stepWriteTurnaround(cfg: ResolvedBridgeConfig, s: SequencerState): SequencerState {
  if (s.counter > 0) return { ...s, counter: s.counter - 1 };
  const req = s.request;
  if (req === null || s.residual === 0) {
    return { ...s, phase: BridgePhase.Idle, counter: 0, request: null, frame: releasedFrame(cfg, s.frame), stall: false };
  }
  const lane = selectLane(s.residual, cfg);
  return {
    ...s,
    phase: BridgePhase.WriteActive,
    lane,
    frame: laneFrame(cfg, req, s.residual, lane, s.frame),
    residual: nextMask(s.residual, cfg),
    counter: cfg.writeActive - 1,
  };
}

export function stepSequencer(cfg: ResolvedBridgeConfig, prev: SequencerState, input: BusInputs): SequencerState {
  if (input.reset) return initialSequencerState(cfg);

  // ack and accepted are single-edge pulses
  const s: SequencerState = { ...prev, ack: false, accepted: false };
  switch (s.phase) {
    case BridgePhase.Idle: return stepIdle(cfg, s, input);
    case BridgePhase.Read: return stepRead(cfg, s, input);
    case BridgePhase.ReadTurnaround: return stepReadTurnaround(s);
    case BridgePhase.WriteActive: return stepWriteActive(cfg, s);
    case BridgePhase.WriteTurnaround: return stepWriteTurnaround(cfg, s);
  }
}
