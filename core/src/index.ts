// Экспорт типов
export * from './types';
export * from './spec/types';
export * from './geometry/types';
export * from './motion/types';
export * from './program/types';
export * from './gcode/instructions';
export * from './gcode/types';

// Генерация
export { GCodeGenerator, generateProgram } from './program/GCodeGenerator';
export { validateSpec, DEFAULT_FEED_RATE } from './spec/validate';
export { expandSample, randomTool, randomToolLibrary } from './spec/sample';
export { MotionPlanner } from './motion/MotionPlanner';
export { CommandEmitter } from './gcode/CommandEmitter';
export type { EmitterOptions } from './gcode/CommandEmitter';
export { serializeProgram, serializeRecord } from './gcode/Serializer';
export type { SerializeOptions } from './gcode/Serializer';
export { ProgramReader } from './gcode/ProgramReader';

// Геометрия
export {
  chordSegmentCount,
  angularSegmentCount,
  sampleArc,
  sampleLine,
  samplePath,
  makeArc
} from './geometry/primitives';
export { shapePath } from './geometry/shapes';

// Экспорт состояния
export { MachineState } from './state/machine-state';
export type { MachineStateData } from './state/machine-state';

// Экспорт утилит
export { Logger } from './utils/logger';
export { ErrorHandler, GenerationError } from './utils/error-handler';
export { SeededRandom } from './utils/random';
export { roundTo, formatNumber } from './utils/format';
