import { Position } from '../types';

export type MotionMode = 'rapid' | 'linear' | 'arcCW' | 'arcCCW';

// approach: travel/plunge onto a shape, leadIn: feed from the start position onto the first shape,
// cut: the shape itself, retract: final lift to safe Z
export type MotionPhase = 'approach' | 'leadIn' | 'cut' | 'retract';

interface StepBase {
  target: Position;
  phase: MotionPhase;
}

export interface RapidStep extends StepBase {
  mode: 'rapid';
}

export interface LinearStep extends StepBase {
  mode: 'linear';
  feedRate: number;
}

export interface ArcStep extends StepBase {
  mode: 'arcCW' | 'arcCCW';
  feedRate: number;
  direction: 'cw' | 'ccw';
  // Offset from the arc start to its centre
  centerOffset: { i: number; j: number };
  // Closes on its own start at output precision; kept even though it goes nowhere
  fullTurn: boolean;
}

export type MotionStep = RapidStep | LinearStep | ArcStep;

export interface MotionGroup {
  shapeIndex: number;
  layer: number; // 1-based
  layerCount: number;
  z: number;
  steps: MotionStep[];
}

export interface MotionPlan {
  // Full-axis rapid that establishes the start position (at safe Z when one is set)
  header: RapidStep;
  groups: MotionGroup[];
  // Lift to safe Z after the last shape, when one is configured
  retract: RapidStep | null;
}
