import { EventEmitter } from 'eventemitter3';
import { CommandEmitter } from '../gcode/CommandEmitter';
import { InstructionFamily, InstructionRecord, MotionOpcode } from '../gcode/instructions';
import { serializeProgram } from '../gcode/Serializer';
import { MotionPlanner } from '../motion/MotionPlanner';
import { MotionPlan } from '../motion/types';
import { validateSpec } from '../spec/validate';
import { ResolvedSpec } from '../spec/types';
import { GenerationSpec } from '../types';
import { Logger } from '../utils/logger';
import { SeededRandom } from '../utils/random';
import { describeLayer, describeShape } from './describe';
import { GenerationResult, GenerationStats, GeneratorEvents } from './types';

/**
 * Program Assembler: validates a Generation Spec, plans its shapes and emits
 * the whole program between one program start and one program end.
 *
 * Every call to `generate` works on its own Machine State, random source and
 * record list, so one generator can be reused for any number of specs.
 */
export class GCodeGenerator extends EventEmitter<GeneratorEvents> {
  private readonly logger = new Logger('GCodeGenerator');

  generate(input: GenerationSpec | Record<string, unknown>): GenerationResult {
    const spec = validateSpec(input);
    const random = spec.jitter ? new SeededRandom(spec.jitter.seed) : undefined;
    const plan = new MotionPlanner(spec, random).plan();

    const emitter = new CommandEmitter({
      precision: spec.precision,
      axes: spec.axes,
      fullAxisOutput: spec.fullAxisOutput,
      travelRate: spec.travelRate,
      rapidFeed: spec.dialect.rapidFeed,
      extrusion: spec.extrusion,
      compensation:
        spec.tool?.compensation !== undefined
          ? { side: spec.tool.compensation, toolNumber: spec.tool.number }
          : undefined,
      maxInstructions: spec.maxInstructions
    });

    this.emitHeader(emitter, spec, plan);
    this.emitShapes(emitter, spec, plan);
    this.emitFooter(emitter, spec, plan);

    const instructions = emitter.getInstructions();
    this.checkProgram(instructions);

    const stats = collectStats(instructions, spec, plan);
    const text = serializeProgram(instructions, {
      precision: spec.precision,
      commentStyle: spec.commentStyle,
      lineNumbers: spec.lineNumbers
    });

    this.logger.debug(`Generated ${stats.instructionCount} instructions for ${stats.shapeCount} shape(s)`);
    this.emit('complete', stats);
    return { text, instructions, stats };
  }

  private emitHeader(emitter: CommandEmitter, spec: ResolvedSpec, plan: MotionPlan): void {
    emitter.programStart(spec.units);
    if (spec.programName) {
      emitter.comment(spec.programName);
    }

    const { tool } = spec;
    if (tool) {
      emitter.toolChange(tool);
      if (tool.spindleSpeed !== undefined) {
        emitter.spindleOn(tool.direction, tool.spindleSpeed);
      }
      emitter.coolant(tool.coolant);
    }

    if (spec.extrusion) {
      emitter.extrusionMode(spec.extrusion.relative);
    }

    emitter.emitStep(plan.header);
  }

  private emitShapes(emitter: CommandEmitter, spec: ResolvedSpec, plan: MotionPlan): void {
    for (const group of plan.groups) {
      const job = spec.shapes[group.shapeIndex];

      if (group.layer === 1) {
        this.emit('shapeStart', { index: job.index, kind: job.shape.kind, name: job.name, layers: job.layers });
        emitter.comment(describeShape(job, spec.precision));
      }
      if (group.layerCount > 1) {
        this.emit('layerStart', {
          shapeIndex: group.shapeIndex,
          layer: group.layer,
          layerCount: group.layerCount,
          z: group.z
        });
        emitter.comment(describeLayer(group.layer, group.layerCount, group.z, spec.precision));
      }

      for (const step of group.steps) {
        emitter.emitStep(step);
      }
      emitter.endCut();
    }
  }

  private emitFooter(emitter: CommandEmitter, spec: ResolvedSpec, plan: MotionPlan): void {
    if (plan.retract) {
      emitter.emitStep(plan.retract);
    }
    emitter.spindleOff();
    emitter.coolant('off');
    emitter.programEnd(spec.dialect.programEnd);
  }

  // Exactly one program start, first, and one program end, last
  private checkProgram(instructions: readonly InstructionRecord[]): void {
    const starts = instructions.filter(record => record.family === 'programStart').length;
    const ends = instructions.filter(record => record.family === 'programEnd').length;
    const first = instructions[0];
    const last = instructions[instructions.length - 1];

    if (starts !== 1 || ends !== 1 || first?.family !== 'programStart' || last?.family !== 'programEnd') {
      throw new Error(`Malformed program: ${starts} program start(s), ${ends} program end(s)`);
    }
  }
}

function collectStats(instructions: readonly InstructionRecord[], spec: ResolvedSpec, plan: MotionPlan): GenerationStats {
  const families: Record<InstructionFamily, number> = {
    programStart: 0,
    motion: 0,
    state: 0,
    comment: 0,
    programEnd: 0
  };
  const motions: Record<MotionOpcode, number> = { G0: 0, G1: 0, G2: 0, G3: 0 };

  for (const record of instructions) {
    families[record.family] += 1;
    if (record.family === 'motion') {
      motions[record.opcode] += 1;
    }
  }

  return {
    instructionCount: instructions.length,
    families,
    motions,
    shapeCount: spec.shapes.length,
    layerCount: plan.groups.length
  };
}

/** One-shot helper around a throwaway generator */
export function generateProgram(input: GenerationSpec | Record<string, unknown>): GenerationResult {
  return new GCodeGenerator().generate(input);
}
