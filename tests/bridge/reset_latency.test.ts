import { describe, it, expect } from 'vitest';
import { SramBridge } from '../../src/bridge/bridge';
import { DelayLine } from '../../src/bridge/delayLine';
import { BridgePhase, IDLE_INPUTS, type BusInputs } from '../../src/bridge/types';

const idle = (over: Partial<BusInputs> = {}): BusInputs => ({ ...IDLE_INPUTS, ...over });

const request = (address: number, byteSelectMask: number, write: boolean, writeData = 0): BusInputs =>
  idle({ cycleValid: true, strobeValid: true, writeEnableIn: write, address, byteSelectMask, writeData });

describe('DelayLine', () => {
  it('returns the value pushed depth ticks earlier', () => {
    const d = new DelayLine<number>(2, 0);
    expect(d.push(1)).toBe(0);
    expect(d.push(2)).toBe(0);
    expect(d.push(3)).toBe(1);
    expect(d.push(4)).toBe(2);
    d.reset();
    expect(d.push(9)).toBe(0);
  });

  it('is a wire at depth 0', () => {
    const d = new DelayLine<string>(0, 'x');
    expect(d.push('a')).toBe('a');
  });
});

describe('Synchronous reset', () => {
  it('returns to Idle with every enable released on the reset edge', () => {
    const bridge = new SramBridge({ dataWidth: 32, laneWidth: 8, writeActive: 3, writeTurnaround: 2 });
    bridge.tick(request(4, 0xf, true, 0x01020304));
    bridge.tick(idle());
    const out = bridge.tick(idle({ reset: true }));

    expect(out.phase).toBe(BridgePhase.Idle);
    expect(out.stall).toBe(false);
    expect(out.ack).toBe(false);
    expect(out.chip).toEqual({ address: 0, dataOut: 0, driveData: false, ceN: 1, oeN: 1, weN: 1, beN: null });
    const s = bridge.snapshot();
    expect(s.residual).toBe(0);
    expect(s.request).toBeNull();

    const after = bridge.tick(idle());
    expect(after.phase).toBe(BridgePhase.Idle);
    expect(after.chip.weN).toBe(1);
  });

  it('flushes the output latency stage as well', () => {
    const bridge = new SramBridge({ dataWidth: 32, laneWidth: 32, readActive: 4, outputLatency: 2 });
    bridge.tick(request(1, 0xf, false));
    expect(bridge.tick(idle()).chip.oeN).toBe(1);
    expect(bridge.tick(idle()).chip.oeN).toBe(0);
    const out = bridge.tick(idle({ reset: true }));
    expect(out.chip.oeN).toBe(1);
    expect(out.chip.ceN).toBe(0xf);
    expect(bridge.tick(idle()).chip.oeN).toBe(1);
  });

  it('does not accept a request presented on the reset edge', () => {
    const bridge = new SramBridge();
    const out = bridge.tick({ ...request(1, 0xf, false), reset: true });
    expect(out.accepted).toBe(false);
    expect(out.phase).toBe(BridgePhase.Idle);
  });
});

describe('Latency compensation', () => {
  it('delays chip frames by outputLatency ticks', () => {
    const bridge = new SramBridge({ dataWidth: 32, laneWidth: 32, readActive: 2, outputLatency: 1 });
    const first = bridge.tick(request(6, 0xf, false));
    expect(first.chip.oeN).toBe(1);
    const second = bridge.tick(idle());
    expect(second.chip.oeN).toBe(0);
    expect(second.chip.address).toBe(6);
  });

  it('extends each read lane by the round trip', () => {
    const bridge = new SramBridge({ dataWidth: 32, laneWidth: 32, readActive: 1, outputLatency: 1, inputLatency: 1 });
    const outs = [
      bridge.tick(request(3, 0xf, false)),
      bridge.tick(idle({ chipDataIn: 0 })),
      bridge.tick(idle({ chipDataIn: 0x55aa55aa })),
      bridge.tick(idle({ chipDataIn: 0x55aa55aa })),
    ];
    expect(outs.map((o) => o.ack)).toEqual([false, false, false, true]);
    expect(outs[3].readData).toBe(0x55aa55aa);
    expect(bridge.snapshot().phase).toBe(BridgePhase.Idle);
  });
});
