import { Units } from '../types';

export type MotionOpcode = 'G0' | 'G1' | 'G2' | 'G3';

export type StateOpcode =
  | 'G40' // cutter compensation off
  | 'G41' // compensation left
  | 'G42' // compensation right
  | 'G92' // set position (extruder reset)
  | 'M3' // spindle clockwise
  | 'M4' // spindle counter-clockwise
  | 'M5' // spindle stop
  | 'M6' // tool change
  | 'M7' // mist coolant
  | 'M8' // flood coolant
  | 'M9' // coolant off
  | 'M82' // absolute extrusion
  | 'M83'; // relative extrusion

export type UnitsOpcode = 'G20' | 'G21';
export type ProgramEndOpcode = 'M2' | 'M30';
export type ModalWord = 'G17' | 'G90';

export type ArgLetter = 'X' | 'Y' | 'Z' | 'E' | 'I' | 'J' | 'F' | 'S' | 'T' | 'D';
export type InstructionArgs = Readonly<Partial<Record<ArgLetter, number>>>;

export interface ProgramStartRecord {
  readonly family: 'programStart';
  readonly opcode: UnitsOpcode;
  readonly modes: readonly ModalWord[];
}

export interface MotionRecord {
  readonly family: 'motion';
  readonly opcode: MotionOpcode;
  readonly args: InstructionArgs;
}

export interface StateRecord {
  readonly family: 'state';
  readonly opcode: StateOpcode;
  readonly args: InstructionArgs;
}

export interface CommentRecord {
  readonly family: 'comment';
  readonly text: string;
}

export interface ProgramEndRecord {
  readonly family: 'programEnd';
  readonly opcode: ProgramEndOpcode;
}

export type InstructionRecord = ProgramStartRecord | MotionRecord | StateRecord | CommentRecord | ProgramEndRecord;

export type InstructionFamily = InstructionRecord['family'];

/** Word order on the output line, independent of how the args were built */
export const ARGUMENT_ORDER: Readonly<Record<MotionOpcode | StateOpcode, readonly ArgLetter[]>> = {
  G0: ['X', 'Y', 'Z', 'E', 'F'],
  G1: ['X', 'Y', 'Z', 'E', 'F'],
  G2: ['X', 'Y', 'Z', 'E', 'I', 'J', 'F'],
  G3: ['X', 'Y', 'Z', 'E', 'I', 'J', 'F'],
  G40: [],
  G41: ['D'],
  G42: ['D'],
  G92: ['X', 'Y', 'Z', 'E'],
  M3: ['S'],
  M4: ['S'],
  M5: [],
  M6: ['T'],
  M7: [],
  M8: [],
  M9: [],
  M82: [],
  M83: []
};

export const Instructions = {
  programStart(units: Units): ProgramStartRecord {
    return Object.freeze({
      family: 'programStart',
      opcode: units === 'inch' ? 'G20' : 'G21',
      modes: Object.freeze<ModalWord[]>(['G17', 'G90'])
    });
  },

  motion(opcode: MotionOpcode, args: InstructionArgs): MotionRecord {
    return Object.freeze({ family: 'motion', opcode, args: Object.freeze({ ...args }) });
  },

  state(opcode: StateOpcode, args: InstructionArgs = {}): StateRecord {
    return Object.freeze({ family: 'state', opcode, args: Object.freeze({ ...args }) });
  },

  comment(text: string): CommentRecord {
    return Object.freeze({ family: 'comment', text });
  },

  programEnd(opcode: ProgramEndOpcode): ProgramEndRecord {
    return Object.freeze({ family: 'programEnd', opcode });
  }
};
