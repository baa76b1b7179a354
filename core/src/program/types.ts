import { InstructionFamily, InstructionRecord, MotionOpcode } from '../gcode/instructions';
import { ShapeKind } from '../types';

export interface GenerationStats {
  instructionCount: number;
  families: Record<InstructionFamily, number>;
  motions: Record<MotionOpcode, number>;
  shapeCount: number;
  // shape repetitions, one per layer of every shape
  layerCount: number;
}

export interface GenerationResult {
  text: string;
  instructions: readonly InstructionRecord[];
  stats: GenerationStats;
}

export interface ShapeStartEvent {
  index: number;
  kind: ShapeKind;
  name?: string;
  layers: number;
}

export interface LayerStartEvent {
  shapeIndex: number;
  layer: number;
  layerCount: number;
  z: number;
}

export type GeneratorEvents = {
  shapeStart: [event: ShapeStartEvent];
  layerStart: [event: LayerStartEvent];
  complete: [stats: GenerationStats];
};
