// tests/helpers/program-helpers.ts
import { InstructionRecord, MotionRecord } from '../../src/gcode/instructions';
import { GenerationError } from '../../src/utils/error-handler';

export const programLines = (text: string): string[] => text.trimEnd().split('\n');

export const motionRecords = (records: readonly InstructionRecord[]): MotionRecord[] =>
  records.filter((record): record is MotionRecord => record.family === 'motion');

// Splits records at each layer comment; the records before the first layer are dropped
export const recordsByLayer = (records: readonly InstructionRecord[]): InstructionRecord[][] => {
  const layers: InstructionRecord[][] = [];
  for (const record of records) {
    if (record.family === 'comment' && record.text.startsWith('layer ')) {
      layers.push([]);
    } else if (layers.length > 0) {
      layers[layers.length - 1].push(record);
    }
  }
  return layers;
};

export const captureError = (fn: () => unknown): GenerationError => {
  try {
    fn();
  } catch (error) {
    if (error instanceof GenerationError) return error;
    throw error;
  }
  throw new Error('expected a GenerationError');
};
