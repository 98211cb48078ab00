import { SramBridge } from '../bridge/bridge';
import type { BridgeConfig } from '../bridge/config';
import { BridgePhase, type BridgeOutputs } from '../bridge/types';
import { AsyncSram } from '../chip/asyncSram';
import { BusKeeper } from '../chip/busKeeper';
import { BusMaster, type BusTransaction, type CompletedTransaction } from './busMaster';
import { MasterClock } from './masterClock';
import { formatTraceLine, traceFingerprint, type TraceEntry } from './trace';

export type FaultMode = 'ignore' | 'throw' | 'record';

export interface TestbenchOptions {
  traceEveryTick?: number; // if >0, log every Nth edge
  onFault?: FaultMode;
  record?: boolean;        // keep a TraceEntry per edge (default true)
  sramSize?: number;
  env?: Record<string, string | undefined>;
}

// Wires requester -> bridge -> SRAM -> data bus keeper and steps them edge by edge.
export class Testbench {
  readonly bridge: SramBridge;
  readonly sram: AsyncSram;
  readonly keeper: BusKeeper;
  readonly master: BusMaster;
  readonly clock: MasterClock;
  readonly trace: TraceEntry[] = [];
  readonly faults: string[] = [];
  private now = 0;
  private resetPending = false;
  private readonly traceEveryTick: number;
  private readonly onFault: FaultMode;
  private readonly record: boolean;

  constructor(config: BridgeConfig = {}, opts: TestbenchOptions = {}) {
    const env: Record<string, string | undefined> = opts.env ?? (typeof process !== 'undefined' && process?.env ? process.env : {});
    this.bridge = new SramBridge(config);
    this.sram = new AsyncSram(this.bridge.config, opts.sramSize);
    this.keeper = new BusKeeper(this.bridge.config.laneWidth);
    this.master = new BusMaster(this.bridge.config);
    this.clock = new MasterClock(() => { this.stepTick(); });
    const envTrace = env.BRIDGE_TRACE === '1' || env.BRIDGE_TRACE === 'true' ? 1 : 0;
    this.traceEveryTick = Math.max(0, opts.traceEveryTick ?? envTrace) | 0;
    this.onFault = opts.onFault ?? 'record';
    this.record = opts.record ?? true;
  }

  get tick(): number { return this.now; }

  enqueue(...txs: BusTransaction[]): void {
    this.master.enqueue(...txs);
  }

  get completed(): CompletedTransaction[] {
    return this.master.completed;
  }

  // Asserts reset for the next edge only.
  pulseReset(): void {
    this.resetPending = true;
  }

  stepTick(): BridgeOutputs {
    const reset = this.resetPending;
    this.resetPending = false;
    const tick = this.now;

    const signals = this.master.drive(tick);
    const out = this.bridge.tick({ ...signals, reset, chipDataIn: this.keeper.read() });

    const contentionsBefore = this.sram.contentions;
    const response = this.sram.respond(out.chip);
    const dataBus = this.keeper.resolve(out.chip, response);
    const fault = this.sram.contentions !== contentionsBefore
      ? `bus contention at tick ${tick} (address ${out.chip.address})`
      : null;

    if (reset) this.master.abortInFlight();
    else this.master.observe(tick, out);

    const entry: TraceEntry = {
      tick,
      reset,
      phase: out.phase,
      stall: out.stall,
      ack: out.ack,
      accepted: out.accepted,
      readData: out.readData,
      chip: out.chip,
      dataBus,
    };
    if (this.record) this.trace.push(entry);
    if (this.traceEveryTick > 0 && (tick % this.traceEveryTick) === 0) {
      // eslint-disable-next-line no-console
      console.log(`[BENCH] ${formatTraceLine(entry)}`);
    }
    this.now++;
    // Raised only once the edge is fully accounted for, so the bench can keep stepping.
    if (fault !== null) this.fault(fault);
    return out;
  }

  run(ticks: number): void {
    this.clock.run(ticks);
  }

  // Runs until every queued transaction completed and the bridge is back in Idle,
  // then lets the latency stages drain so the chip has seen the last frame.
  runUntilIdle(maxTicks = 10000): number {
    const n = this.clock.runUntil(
      () => this.master.idle && this.bridge.snapshot().phase === BridgePhase.Idle && !this.bridge.snapshot().stall,
      maxTicks,
    );
    const drain = this.bridge.config.outputLatency + this.bridge.config.inputLatency;
    this.clock.run(drain);
    return n + drain;
  }

  fingerprint(): string {
    return traceFingerprint(this.trace);
  }

  private fault(message: string): void {
    if (this.onFault === 'throw') throw new Error(`[BENCH] ${message}`);
    if (this.onFault === 'record') this.faults.push(message);
  }
}
