import { resolveConfig, type BridgeConfig, type ResolvedBridgeConfig } from './config';
import { DelayLine } from './delayLine';
import { initialSequencerState, releasedFrame, stepSequencer, type SequencerState } from './sequencer';
import type { BridgeOutputs, BusInputs, ChipFrame, IClocked } from './types';

// Sequencer plus the fixed latency stages at the chip boundary.
export class SramBridge implements IClocked<BusInputs, BridgeOutputs> {
  readonly config: ResolvedBridgeConfig;
  private state: SequencerState;
  private readonly outputStage: DelayLine<ChipFrame>;
  private readonly inputStage: DelayLine<number>;

  constructor(config: BridgeConfig = {}) {
    this.config = resolveConfig(config);
    this.state = initialSequencerState(this.config);
    this.outputStage = new DelayLine<ChipFrame>(this.config.outputLatency, releasedFrame(this.config));
    this.inputStage = new DelayLine<number>(this.config.inputLatency, 0);
  }

  reset(): void {
    this.state = initialSequencerState(this.config);
    this.outputStage.reset();
    this.inputStage.reset();
  }

  tick(input: BusInputs): BridgeOutputs {
    if (input.reset) {
      // Flush the latency stages too so the chip sees released lines on this edge.
      this.outputStage.reset();
      this.inputStage.reset();
    }
    const chipDataIn = this.inputStage.push(input.chipDataIn);
    this.state = stepSequencer(this.config, this.state, { ...input, chipDataIn });
    return this.outputs(this.outputStage.push(this.state.frame));
  }

  // Internal state after the last edge, for tracing and tests.
  snapshot(): SequencerState {
    return this.state;
  }

  private outputs(chip: ChipFrame): BridgeOutputs {
    const s = this.state;
    return {
      stall: s.stall,
      ack: s.ack,
      readData: s.readData,
      accepted: s.accepted,
      phase: s.phase,
      chip,
    };
  }
}
