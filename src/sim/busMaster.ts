import type { ResolvedBridgeConfig } from '../bridge/config';
import { laneCountOf } from '../bridge/decomposer';
import type { BusInputs, BusOutputs, ByteMask, Word } from '../bridge/types';

export interface BusTransaction {
  address: number;
  byteMask: ByteMask;
  write: boolean;
  data?: Word;
  notBefore?: number; // earliest tick the request may be presented
  label?: string;
}

export interface CompletedTransaction {
  request: BusTransaction;
  acceptedAt: number;
  completedAt: number;
  acks: number[];           // ticks at which acknowledges arrived
  readData: Word | null;    // read buffer at the final acknowledge
  laneReads: Word[];        // read buffer at every acknowledge
}

interface InFlight {
  request: BusTransaction;
  acceptedAt: number;
  expectedAcks: number;
  acks: number[];
  laneReads: Word[];
}

export type MasterSignals = Omit<BusInputs, 'reset' | 'chipDataIn'>;

// Pipelined bus requester: holds the head request on the bus until the bridge
// latches it, then counts acknowledges to decide when it has completed.
export class BusMaster {
  private queue: BusTransaction[] = [];
  private inFlight: InFlight[] = [];
  private presenting = false;
  readonly completed: CompletedTransaction[] = [];
  readonly aborted: BusTransaction[] = [];

  constructor(private readonly cfg: ResolvedBridgeConfig) {}

  enqueue(...txs: BusTransaction[]): void {
    this.queue.push(...txs);
  }

  get idle(): boolean {
    return this.queue.length === 0 && this.inFlight.length === 0;
  }

  // One acknowledge for a write; one per lane for a read; one for an empty mask.
  expectedAcks(tx: BusTransaction): number {
    if (tx.write) return 1;
    return Math.max(1, laneCountOf(tx.byteMask & this.cfg.fullByteMask, this.cfg));
  }

  drive(tick: number): MasterSignals {
    const head = this.queue[0];
    this.presenting = head !== undefined && (head.notBefore ?? 0) <= tick;
    if (!this.presenting || head === undefined) {
      return {
        cycleValid: this.inFlight.length > 0,
        strobeValid: false,
        writeEnableIn: false,
        address: 0,
        writeData: 0,
        byteSelectMask: 0,
      };
    }
    return {
      cycleValid: true,
      strobeValid: true,
      writeEnableIn: head.write,
      address: head.address,
      writeData: head.data ?? 0,
      byteSelectMask: head.byteMask,
    };
  }

  observe(tick: number, out: BusOutputs): void {
    if (out.accepted && this.presenting) {
      const request = this.queue.shift();
      if (request !== undefined) {
        this.inFlight.push({ request, acceptedAt: tick, expectedAcks: this.expectedAcks(request), acks: [], laneReads: [] });
      }
    }
    if (!out.ack) return;
    const head = this.inFlight[0];
    if (head === undefined) return;
    head.acks.push(tick);
    if (!head.request.write) head.laneReads.push(out.readData);
    if (head.acks.length < head.expectedAcks) return;
    this.inFlight.shift();
    this.completed.push({
      request: head.request,
      acceptedAt: head.acceptedAt,
      completedAt: tick,
      acks: head.acks,
      readData: head.request.write ? null : out.readData,
      laneReads: head.laneReads,
    });
  }

  // Reset discards whatever the bridge had latched; queued requests stay queued.
  abortInFlight(): void {
    for (const f of this.inFlight) this.aborted.push(f.request);
    this.inFlight = [];
    this.presenting = false;
  }
}
