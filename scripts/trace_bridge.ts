#!/usr/bin/env tsx
/*
Runs a transaction program through the bridge and prints the edge-by-edge trace.

Usage:
  tsx scripts/trace_bridge.ts [--program=programs/burst_demo.json] [--preset=NAME]
                              [--readActive=N] [--fastRead] [--outputLatency=N] ... [--quiet]

Configuration is layered: BRIDGE_* environment variables, then --preset, then
individual --key=value flags (any BridgeConfig field).
*/
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { configFromEnv, type BridgeConfig } from '../src/bridge/config';
import { PRESETS, presetNames } from '../src/timing/presets';
import { Testbench } from '../src/sim/testbench';
import { formatTraceLine } from '../src/sim/trace';
import type { BusTransaction } from '../src/sim/busMaster';

function parseArgs(argv: string[]) {
  const out: Record<string, string | number | boolean> = {};
  for (const a of argv) {
    const m = a.match(/^--([^=]+)=(.*)$/);
    if (m) {
      const k = m[1];
      let v: string | number | boolean = m[2];
      if (/^\d+$/.test(v)) v = Number(v);
      else if (v === 'true' || v === 'false') v = v === 'true';
      out[k] = v;
    } else if (a.startsWith('--')) {
      out[a.slice(2)] = true;
    }
  }
  return out;
}

const NUMERIC_KEYS = ['addressWidth', 'dataWidth', 'laneWidth', 'readActive', 'readTurnaround', 'writeActive', 'writeTurnaround', 'outputLatency', 'inputLatency'] as const;
const FLAG_KEYS = ['byteEnable', 'fastRead'] as const;

function configFromArgs(args: Record<string, string | number | boolean>): BridgeConfig {
  const cfg: BridgeConfig = {};
  for (const k of NUMERIC_KEYS) {
    const v = args[k];
    if (typeof v === 'number') cfg[k] = v;
  }
  for (const k of FLAG_KEYS) {
    const v = args[k];
    if (typeof v === 'boolean') cfg[k] = v;
  }
  return cfg;
}

const num = (v: unknown): number => {
  if (typeof v === 'number') return v;
  if (typeof v === 'string') return v.toLowerCase().startsWith('0x') ? parseInt(v.slice(2), 16) : Number(v);
  return 0;
};

function loadProgram(file: string): BusTransaction[] {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  const list: unknown = typeof raw === 'object' && raw !== null && 'transactions' in raw ? raw.transactions : undefined;
  if (!Array.isArray(list)) {
    throw new Error(`[TRACE] ${file}: expected { "transactions": [...] }`);
  }
  return list.map((t: Record<string, unknown>, i: number): BusTransaction => ({
    label: typeof t.label === 'string' ? t.label : `tx${i}`,
    write: t.write === true,
    address: num(t.address),
    data: num(t.data),
    byteMask: num(t.byteMask),
    notBefore: t.notBefore === undefined ? undefined : num(t.notBefore),
  }));
}

function main() {
  const args = parseArgs(process.argv.slice(2));
  const here = path.dirname(fileURLToPath(import.meta.url));
  const programPath = typeof args.program === 'string' ? path.resolve(args.program) : path.join(here, '..', 'programs', 'burst_demo.json');

  let cfg: BridgeConfig = configFromEnv();
  if (typeof args.preset === 'string') {
    const preset = PRESETS[args.preset];
    if (!preset) {
      console.error(`Unknown preset ${args.preset}; known: ${presetNames().join(', ')}`);
      process.exit(2);
    }
    cfg = { ...cfg, ...preset };
  }
  cfg = { ...cfg, ...configFromArgs(args) };

  const bench = new Testbench(cfg, { onFault: 'record' });
  bench.enqueue(...loadProgram(programPath));
  const ticks = bench.runUntilIdle(Number(args.maxTicks ?? 100000));

  if (!args.quiet) for (const e of bench.trace) console.log(formatTraceLine(e));
  for (const c of bench.completed) {
    const rd = c.readData === null ? '' : ` rd=${c.readData.toString(16).padStart(8, '0')}`;
    console.log(`[TRACE] ${c.request.label ?? '?'} accepted@${c.acceptedAt} done@${c.completedAt} acks=${c.acks.length}${rd}`);
  }
  for (const f of bench.faults) console.log(`[TRACE] fault: ${f}`);
  console.log(`[TRACE] ticks=${ticks} fingerprint=${bench.fingerprint()}`);
}

main();
