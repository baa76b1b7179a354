import { MotionMode, MotionStep } from '../motion/types';
import { AxisSet, ResolvedExtrusion, ResolvedTool } from '../spec/types';
import { MachineState } from '../state/machine-state';
import { GenerationErrorCode, Position, Units } from '../types';
import { ErrorHandler } from '../utils/error-handler';
import { roundTo } from '../utils/format';
import { ArgLetter, InstructionRecord, Instructions, MotionOpcode, ProgramEndOpcode } from './instructions';

export interface EmitterOptions {
  precision: number;
  axes: AxisSet;
  fullAxisOutput: boolean;
  travelRate: number;
  // write F on rapid moves (some controllers want a travel feed on G0)
  rapidFeed: boolean;
  extrusion?: ResolvedExtrusion;
  compensation?: { side: 'left' | 'right'; toolNumber: number };
  maxInstructions?: number;
}

const MOTION_OPCODES: Readonly<Record<MotionMode, MotionOpcode>> = {
  rapid: 'G0',
  linear: 'G1',
  arcCW: 'G2',
  arcCCW: 'G3'
};

/**
 * Walks Motion Steps against a running Machine State and produces Instruction
 * Records. State-changing instructions are only written when the state differs.
 */
export class CommandEmitter {
  private readonly state = new MachineState();
  private readonly records: InstructionRecord[] = [];

  constructor(private readonly options: EmitterOptions) {}

  get count(): number {
    return this.records.length;
  }

  getInstructions(): readonly InstructionRecord[] {
    return [...this.records];
  }

  getState() {
    return this.state.getState();
  }

  programStart(units: Units): void {
    this.push(Instructions.programStart(units));
    this.state.update({ units, distanceMode: 'absolute' });
  }

  comment(text: string): void {
    this.push(Instructions.comment(text));
  }

  toolChange(tool: ResolvedTool): void {
    if (this.state.getState().tool === tool.number) return;
    this.push(Instructions.state('M6', { T: tool.number }));
    this.state.update({ tool: tool.number });
  }

  spindleOn(direction: 'cw' | 'ccw', speed: number): void {
    const rounded = roundTo(speed, this.options.precision);
    const { spindle, spindleSpeed } = this.state.getState();
    if (spindle === direction && spindleSpeed === rounded) return;
    this.push(Instructions.state(direction === 'cw' ? 'M3' : 'M4', { S: rounded }));
    this.state.update({ spindle: direction, spindleSpeed: rounded });
  }

  spindleOff(): void {
    if (!this.state.isSpindleOn()) return;
    this.push(Instructions.state('M5'));
    this.state.update({ spindle: 'off', spindleSpeed: 0 });
  }

  coolant(mode: 'flood' | 'mist' | 'off'): void {
    if (this.state.getState().coolant === mode) return;
    this.push(Instructions.state(mode === 'flood' ? 'M8' : mode === 'mist' ? 'M7' : 'M9'));
    this.state.update({ coolant: mode });
  }

  extrusionMode(relative: boolean): void {
    this.push(Instructions.state(relative ? 'M83' : 'M82'));
    this.push(Instructions.state('G92', { E: 0 }));
    this.state.update({ extrusion: 0 });
  }

  emitStep(step: MotionStep): void {
    const { precision, axes, fullAxisOutput } = this.options;
    const isArc = step.mode === 'arcCW' || step.mode === 'arcCCW';

    // Centre on the start point at output precision: a turn collapses to nothing, a partial arc to a line
    if (isArc && roundTo(step.centerOffset.i, precision) === 0 && roundTo(step.centerOffset.j, precision) === 0) {
      if (!step.fullTurn) {
        this.emitStep({ mode: 'linear', target: step.target, feedRate: step.feedRate, phase: step.phase });
      }
      return;
    }

    const current = this.state.getPosition();
    const target = this.round(step.target);

    // A full turn starts and ends on the same point, every other no-op move is dropped
    if (!(isArc && step.fullTurn) && current && this.samePosition(current, target)) {
      return;
    }

    if (step.phase === 'cut' || step.phase === 'leadIn') {
      this.compensationOn();
    }

    const args: Partial<Record<ArgLetter, number>> = {};
    const changed = (axis: 'x' | 'y' | 'z') => fullAxisOutput || current === null || current[axis] !== target[axis];

    if (isArc || changed('x')) args.X = target.x;
    if (isArc || changed('y')) args.Y = target.y;
    if (axes.z && changed('z')) args.Z = target.z;

    const extrusion = this.options.extrusion;
    if (axes.e && extrusion && step.mode !== 'rapid') {
      const last = this.state.getState().extrusion;
      if (target.e !== last || fullAxisOutput) {
        args.E = extrusion.relative ? roundTo(target.e - last, precision) : target.e;
      }
      this.state.update({ extrusion: target.e });
    }

    if (step.mode === 'arcCW' || step.mode === 'arcCCW') {
      args.I = roundTo(step.centerOffset.i, precision);
      args.J = roundTo(step.centerOffset.j, precision);
    }

    const feed = step.mode === 'rapid' ? (this.options.rapidFeed ? this.options.travelRate : undefined) : step.feedRate;
    if (feed !== undefined) {
      const roundedFeed = roundTo(feed, precision);
      if (roundedFeed !== this.state.getState().feedRate) {
        args.F = roundedFeed;
        this.state.update({ feedRate: roundedFeed });
      }
    }

    const opcode = MOTION_OPCODES[step.mode];
    this.push(Instructions.motion(opcode, args));
    this.state.update({ position: target, motionMode: opcode });
  }

  /** Closes the cut of one shape repetition */
  endCut(): void {
    if (!this.state.isCompensating()) return;
    this.push(Instructions.state('G40'));
    this.state.update({ compensation: 'off' });
  }

  programEnd(opcode: ProgramEndOpcode): void {
    this.endCut();
    this.push(Instructions.programEnd(opcode));
  }

  private compensationOn(): void {
    const compensation = this.options.compensation;
    if (!compensation || this.state.isCompensating()) return;
    this.push(Instructions.state(compensation.side === 'left' ? 'G41' : 'G42', { D: compensation.toolNumber }));
    this.state.update({ compensation: compensation.side });
  }

  private round(position: Position): Position {
    const { precision } = this.options;
    return {
      x: roundTo(position.x, precision),
      y: roundTo(position.y, precision),
      z: roundTo(position.z, precision),
      e: roundTo(position.e, precision)
    };
  }

  private samePosition(a: Position, b: Position): boolean {
    return a.x === b.x && a.y === b.y && a.z === b.z && a.e === b.e;
  }

  private push(record: InstructionRecord): void {
    const { maxInstructions } = this.options;
    if (maxInstructions !== undefined && this.records.length >= maxInstructions) {
      throw ErrorHandler.createError(
        GenerationErrorCode.ProgramTooLarge,
        `Program exceeds the limit of ${maxInstructions} instructions`,
        { limit: maxInstructions, count: this.records.length + 1 }
      );
    }
    this.records.push(record);
  }
}
