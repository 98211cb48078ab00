// Bridge configuration: widths, per-phase cycle counts and boundary latencies.
// Everything here is fixed at construction; the sequencer never re-validates.

export interface BridgeConfig {
  addressWidth?: number;    // wide-word address bits on the bus side
  dataWidth?: number;       // wide bus data bits
  laneWidth?: number;       // chip data bits (one lane)
  byteEnable?: boolean;     // chip has per-byte enable pins (UB/LB style)
  readActive?: number;      // cycles OE/CE held per read lane
  readTurnaround?: number;  // cycles from last read capture until Idle may accept
  writeActive?: number;     // cycles WE/CE held per write lane
  writeTurnaround?: number; // cycles between releasing WE and the next lane / Idle
  fastRead?: boolean;       // chain back-to-back reads without the turnaround
  outputLatency?: number;   // T_CO in ticks
  inputLatency?: number;    // T_IDELAY in ticks
}

export interface ResolvedBridgeConfig {
  readonly addressWidth: number;
  readonly dataWidth: number;
  readonly laneWidth: number;
  readonly byteEnable: boolean;
  readonly readActive: number;
  readonly readTurnaround: number;
  readonly writeActive: number;
  readonly writeTurnaround: number;
  readonly fastRead: boolean;
  readonly outputLatency: number;
  readonly inputLatency: number;

  // Derived
  readonly laneCount: number;
  readonly laneBits: number;
  readonly bytesPerLane: number;
  readonly chipCount: number;     // chip-enable lines
  readonly laneDataMask: number;  // mask of one lane's data bits
  readonly fullByteMask: number;  // every byte of the wide word
  readonly roundTrip: number;     // outputLatency + inputLatency
}

export const DEFAULT_BRIDGE_CONFIG: Readonly<Required<BridgeConfig>> = {
  addressWidth: 16,
  dataWidth: 32,
  laneWidth: 8,
  byteEnable: false,
  readActive: 2,
  readTurnaround: 1,
  writeActive: 2,
  writeTurnaround: 1,
  fastRead: false,
  outputLatency: 0,
  inputLatency: 0,
};

export class BridgeConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: string[]) {
    super(`[BRIDGE] invalid configuration: ${issues.join('; ')}`);
    this.name = 'BridgeConfigError';
    this.issues = issues;
  }
}

const isPowerOfTwo = (n: number): boolean => n > 0 && (n & (n - 1)) === 0;

// Returns every problem found; an empty list means the configuration is usable.
export function validateConfig(cfg: Required<BridgeConfig>): string[] {
  const issues: string[] = [];
  const durations: [string, number][] = [
    ['readActive', cfg.readActive],
    ['readTurnaround', cfg.readTurnaround],
    ['writeActive', cfg.writeActive],
    ['writeTurnaround', cfg.writeTurnaround],
  ];
  for (const [name, v] of durations) {
    if (!Number.isInteger(v) || v <= 0) issues.push(`${name} must be a positive integer (got ${v})`);
  }
  if (cfg.fastRead && cfg.readActive === 1) {
    issues.push('fastRead requires readActive > 1');
  }

  const widthsOk = [
    ['dataWidth', cfg.dataWidth],
    ['laneWidth', cfg.laneWidth],
  ] as const;
  let widthError = false;
  for (const [name, v] of widthsOk) {
    if (!Number.isInteger(v) || v <= 0 || v % 8 !== 0 || v > 32) {
      issues.push(`${name} must be a multiple of 8 between 8 and 32 (got ${v})`);
      widthError = true;
    }
  }
  if (!widthError) {
    if (cfg.dataWidth % cfg.laneWidth !== 0) {
      issues.push(`dataWidth ${cfg.dataWidth} is not a multiple of laneWidth ${cfg.laneWidth}`);
    } else {
      const lanes = cfg.dataWidth / cfg.laneWidth;
      if (!isPowerOfTwo(lanes)) issues.push(`lane count ${lanes} must be a power of two`);
      else if (Number.isInteger(cfg.addressWidth) && cfg.addressWidth + Math.log2(lanes) > 32) {
        issues.push(`addressWidth ${cfg.addressWidth} plus ${Math.log2(lanes)} lane bits exceeds 32`);
      }
    }
  }
  if (!Number.isInteger(cfg.addressWidth) || cfg.addressWidth <= 0) {
    issues.push(`addressWidth must be a positive integer (got ${cfg.addressWidth})`);
  }

  for (const [name, v] of [['outputLatency', cfg.outputLatency], ['inputLatency', cfg.inputLatency]] as const) {
    if (!Number.isInteger(v) || v < 0) issues.push(`${name} must be a non-negative integer (got ${v})`);
  }
  return issues;
}

export function resolveConfig(partial: BridgeConfig = {}): ResolvedBridgeConfig {
  const cfg: Required<BridgeConfig> = { ...DEFAULT_BRIDGE_CONFIG };
  for (const key of Object.keys(partial) as (keyof BridgeConfig)[]) {
    const v = partial[key];
    if (v !== undefined) Object.assign(cfg, { [key]: v });
  }
  const issues = validateConfig(cfg);
  if (issues.length > 0) throw new BridgeConfigError(issues);

  const laneCount = cfg.dataWidth / cfg.laneWidth;
  const bytesPerLane = cfg.laneWidth / 8;
  return Object.freeze({
    ...cfg,
    laneCount,
    laneBits: Math.log2(laneCount),
    bytesPerLane,
    chipCount: cfg.byteEnable ? 1 : bytesPerLane,
    laneDataMask: cfg.laneWidth === 32 ? 0xffffffff : ((1 << cfg.laneWidth) - 1) >>> 0,
    fullByteMask: (1 << (cfg.dataWidth / 8)) - 1,
    roundTrip: cfg.outputLatency + cfg.inputLatency,
  });
}

function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const cleaned = raw.trim().toLowerCase();
  if (cleaned.startsWith('$')) return parseInt(cleaned.slice(1), 16);
  if (cleaned.startsWith('0x')) return parseInt(cleaned.slice(2), 16);
  return Number(cleaned);
}

function parseFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const v = raw.trim().toLowerCase();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

// Reads BRIDGE_* variables; unset variables are left out so defaults apply.
export function configFromEnv(
  env: Record<string, string | undefined> = (typeof process !== 'undefined' && process?.env ? process.env : {}),
): BridgeConfig {
  const out: BridgeConfig = {
    addressWidth: parseNumber(env.BRIDGE_ADDRESS_WIDTH),
    dataWidth: parseNumber(env.BRIDGE_DATA_WIDTH),
    laneWidth: parseNumber(env.BRIDGE_LANE_WIDTH),
    byteEnable: parseFlag(env.BRIDGE_BYTE_ENABLE),
    readActive: parseNumber(env.BRIDGE_READ_ACTIVE),
    readTurnaround: parseNumber(env.BRIDGE_READ_TURNAROUND),
    writeActive: parseNumber(env.BRIDGE_WRITE_ACTIVE),
    writeTurnaround: parseNumber(env.BRIDGE_WRITE_TURNAROUND),
    fastRead: parseFlag(env.BRIDGE_FAST_READ),
    outputLatency: parseNumber(env.BRIDGE_OUTPUT_LATENCY),
    inputLatency: parseNumber(env.BRIDGE_INPUT_LATENCY),
  };
  for (const key of Object.keys(out) as (keyof BridgeConfig)[]) {
    if (out[key] === undefined) delete out[key];
  }
  return out;
}
