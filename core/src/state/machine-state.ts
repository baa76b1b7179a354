import { MotionOpcode } from '../gcode/instructions';
import { Position, Units } from '../types';

export interface MachineStateData {
  units: Units | null;
  distanceMode: 'absolute';
  motionMode: MotionOpcode | null;
  feedRate: number | null;
  // null until the first move establishes it
  position: Position | null;
  // last E value the program has reached (absolute)
  extrusion: number;
  spindle: 'off' | 'cw' | 'ccw';
  spindleSpeed: number;
  coolant: 'off' | 'flood' | 'mist';
  tool: number | null;
  compensation: 'off' | 'left' | 'right';
}

/**
 * Modal state of the program being emitted. Each generation run owns a fresh
 * instance; values are only ever written as the emitter moves forward.
 */
export class MachineState {
  private state: MachineStateData = {
    units: null,
    distanceMode: 'absolute',
    motionMode: null,
    feedRate: null,
    position: null,
    extrusion: 0,
    spindle: 'off',
    spindleSpeed: 0,
    coolant: 'off',
    tool: null,
    compensation: 'off'
  };

  update(updates: Partial<MachineStateData>) {
    this.state = { ...this.state, ...updates };
  }

  getState(): MachineStateData {
    return { ...this.state };
  }

  getPosition(): Position | null {
    return this.state.position ? { ...this.state.position } : null;
  }

  isSpindleOn(): boolean {
    return this.state.spindle !== 'off';
  }

  isCompensating(): boolean {
    return this.state.compensation !== 'off';
  }
}
