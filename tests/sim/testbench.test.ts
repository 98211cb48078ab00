import { describe, it, expect, vi } from 'vitest';
import { Testbench } from '../../src/sim/testbench';
import { BridgePhase } from '../../src/bridge/types';

const quiet = { env: {} };

describe('Testbench: write then read back', () => {
  it('stores partial writes byte by byte and reads them back through four lanes', () => {
    const bench = new Testbench({ dataWidth: 32, laneWidth: 8, readActive: 2, writeActive: 2, writeTurnaround: 1 }, quiet);
    bench.enqueue(
      { label: 'w', write: true, address: 4, data: 0xaabbccdd, byteMask: 0b0101 },
      { label: 'r', write: false, address: 4, byteMask: 0xf },
    );
    bench.runUntilIdle();

    expect(bench.sram.peekWord(4)).toBe(0x00bb00dd);
    expect(bench.sram.read8(17)).toBe(0);
    const [w, r] = bench.completed;
    expect(w.request.label).toBe('w');
    expect(w.acks).toEqual([w.acceptedAt]);
    expect(w.readData).toBeNull();
    expect(r.readData).toBe(0x00bb00dd);
    expect(r.acks).toHaveLength(4);
    expect(r.laneReads).toEqual([0x000000dd, 0x000000dd, 0x00bb00dd, 0x00bb00dd]);
    expect(bench.faults).toEqual([]);
  });

  it('works with one 16-bit part using byte enables', () => {
    const bench = new Testbench({ dataWidth: 32, laneWidth: 16, byteEnable: true }, quiet);
    bench.enqueue(
      { write: true, address: 1, data: 0x11223344, byteMask: 0b1110 },
      { write: false, address: 1, byteMask: 0xf },
    );
    bench.runUntilIdle();
    expect(bench.sram.peekWord(1)).toBe(0x11223300);
    expect(bench.completed[1].readData).toBe(0x11223300);
  });
});

describe('Testbench: fast-read chaining', () => {
  const cfg = { dataWidth: 32, laneWidth: 32, readActive: 3, readTurnaround: 2, fastRead: true };

  const prime = (bench: Testbench): void => {
    bench.sram.pokeWord(1, 0x01020304);
    bench.sram.pokeWord(2, 0x0a0b0c0d);
  };

  it('chains two reads with no idle tick between them', () => {
    const bench = new Testbench(cfg, quiet);
    prime(bench);
    bench.enqueue({ write: false, address: 1, byteMask: 0xf }, { write: false, address: 2, byteMask: 0xf });
    bench.runUntilIdle();

    const [a, b] = bench.completed;
    expect(a.acceptedAt).toBe(0);
    expect(a.completedAt).toBe(3);
    expect(b.acceptedAt).toBe(3);
    expect(b.completedAt).toBe(6);
    expect(a.readData).toBe(0x01020304);
    expect(b.readData).toBe(0x0a0b0c0d);
    expect(bench.trace.slice(0, 6).every((e) => e.stall)).toBe(true);
  });

  it('inserts the turnaround when the second read is one tick late', () => {
    const bench = new Testbench(cfg, quiet);
    prime(bench);
    bench.enqueue({ write: false, address: 1, byteMask: 0xf }, { write: false, address: 2, byteMask: 0xf, notBefore: 4 });
    bench.runUntilIdle();

    const [a, b] = bench.completed;
    expect(a.completedAt).toBe(3);
    expect(b.acceptedAt).toBe(5);
    expect(b.completedAt).toBe(8);
    expect(bench.trace[3].stall).toBe(false);
    expect(bench.trace[4].phase).toBe(BridgePhase.Idle);
    expect(b.readData).toBe(0x0a0b0c0d);
  });
});

describe('Testbench: fast-read chaining with latency', () => {
  it('chains after a two-lane read with output and input latency', () => {
    const bench = new Testbench(
      { dataWidth: 32, laneWidth: 16, readActive: 2, readTurnaround: 2, fastRead: true, outputLatency: 1, inputLatency: 1 },
      quiet,
    );
    bench.sram.pokeWord(1, 0x01020304);
    bench.sram.pokeWord(2, 0x0a0b0c0d);
    bench.enqueue({ write: false, address: 1, byteMask: 0xf }, { write: false, address: 2, byteMask: 0xf });
    bench.runUntilIdle();

    const [a, b] = bench.completed;
    expect(a.acks).toEqual([4, 8]);
    expect(a.readData).toBe(0x01020304);
    expect(b.acceptedAt).toBe(8);
    expect(b.acks).toEqual([12, 16]);
    expect(b.readData).toBe(0x0a0b0c0d);
    expect(bench.trace.slice(0, 16).every((e) => e.stall)).toBe(true);
    expect(bench.faults).toEqual([]);
  });
});

describe('Testbench: faults', () => {
  const forceContention = (bench: Testbench): void => {
    const respond = bench.sram.respond.bind(bench.sram);
    vi.spyOn(bench.sram, 'respond').mockImplementation((frame) => {
      bench.sram.contentions++;
      return respond(frame);
    });
  };

  it('records contention by default', () => {
    const bench = new Testbench({}, quiet);
    forceContention(bench);
    bench.run(2);
    expect(bench.faults).toEqual(['bus contention at tick 0 (address 0)', 'bus contention at tick 1 (address 0)']);
  });

  it('throws after the edge is complete so stepping can continue', () => {
    const bench = new Testbench({}, { env: {}, onFault: 'throw' });
    forceContention(bench);
    expect(() => bench.stepTick()).toThrow('[BENCH] bus contention at tick 0 (address 0)');
    expect(bench.tick).toBe(1);
    expect(bench.trace).toHaveLength(1);
    expect(() => bench.stepTick()).toThrow('[BENCH] bus contention at tick 1 (address 0)');
    expect(bench.tick).toBe(2);
  });
});

describe('Testbench: latency and reset', () => {
  it('captures the right word with output and input latency', () => {
    const bench = new Testbench({ dataWidth: 32, laneWidth: 32, readActive: 1, outputLatency: 1, inputLatency: 1 }, quiet);
    bench.sram.pokeWord(3, 0x55aa55aa);
    bench.enqueue({ write: false, address: 3, byteMask: 0xf });
    bench.runUntilIdle();
    expect(bench.completed[0].completedAt).toBe(3);
    expect(bench.completed[0].readData).toBe(0x55aa55aa);
  });

  it('lets delayed writes reach the chip before reporting idle', () => {
    const bench = new Testbench({ dataWidth: 32, laneWidth: 8, outputLatency: 3 }, quiet);
    bench.enqueue({ write: true, address: 2, data: 0xdeadbeef, byteMask: 0xf });
    bench.runUntilIdle();
    expect(bench.sram.peekWord(2)).toBe(0xdeadbeef);
  });

  it('discards an in-flight read on reset', () => {
    const bench = new Testbench({ dataWidth: 32, laneWidth: 8, readActive: 3 }, quiet);
    bench.enqueue({ write: false, address: 0, byteMask: 0xf });
    bench.run(2);
    bench.pulseReset();
    const out = bench.stepTick();

    expect(out.phase).toBe(BridgePhase.Idle);
    expect(out.chip.ceN).toBe(1);
    expect(out.chip.oeN).toBe(1);
    expect(out.chip.weN).toBe(1);
    expect(bench.master.aborted).toHaveLength(1);
    expect(bench.completed).toHaveLength(0);
    expect(bench.master.idle).toBe(true);
    expect(bench.trace[2].reset).toBe(true);
  });
});

describe('Testbench: tracing', () => {
  it('produces the same fingerprint for the same program', () => {
    const program = [
      { write: true, address: 7, data: 0x12345678, byteMask: 0xf },
      { write: false, address: 7, byteMask: 0x6 },
    ];
    const a = new Testbench({ readActive: 2 }, quiet);
    const b = new Testbench({ readActive: 2 }, quiet);
    const c = new Testbench({ readActive: 3 }, quiet);
    for (const bench of [a, b, c]) {
      bench.enqueue(...program);
      bench.runUntilIdle();
    }
    expect(a.fingerprint()).toBe(b.fingerprint());
    expect(a.fingerprint()).not.toBe(c.fingerprint());
    expect(a.fingerprint()).toMatch(/^[0-9a-f]{8}$/);
  });

  it('logs every edge when BRIDGE_TRACE is set', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    try {
      const bench = new Testbench({}, { env: { BRIDGE_TRACE: '1' } });
      bench.run(2);
      expect(log).toHaveBeenCalledTimes(2);
      expect(String(log.mock.calls[0][0]).startsWith('[BENCH] t=00000 Idle')).toBe(true);
    } finally {
      log.mockRestore();
    }
  });

  it('stays fault-free in throw mode over a mixed program', () => {
    const bench = new Testbench({ laneWidth: 16, byteEnable: true }, { env: {}, onFault: 'throw' });
    bench.enqueue(
      { write: true, address: 3, data: 0x0badf00d, byteMask: 0xf },
      { write: false, address: 3, byteMask: 0xf },
      { write: true, address: 4, data: 0x12345678, byteMask: 0x3 },
    );
    expect(() => bench.runUntilIdle()).not.toThrow();
    expect(bench.completed[1].readData).toBe(0x0badf00d);
  });
});
