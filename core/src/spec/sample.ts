import { Range, SampleShapeKind, ToolOptions } from '../types';
import { ErrorHandler } from '../utils/error-handler';
import { roundTo } from '../utils/format';
import { SeededRandom } from '../utils/random';
import { Fields, fieldName, integerAtLeast, isRecord, optionalRecord, positive, requiredNumber } from './fields';

// Surface speed (ft/min) and tool diameter (in) to RPM
export const SFM_TO_RPM = 3.82;

export const SAMPLE_KINDS: readonly SampleShapeKind[] = ['rectangle', 'slot'];

const DEFAULT_SIZE: Range = { min: 5, max: 20 };

// Common end mill diameters, inches
const TOOL_DIAMETERS = [
  0.25, 0.375, 0.5, 0.625, 0.75, 0.875, 1, 1.125, 1.25, 1.375, 1.5, 1.625, 1.75, 1.875, 2, 2.125, 2.25, 2.375, 2.5,
  2.625, 2.75, 2.875, 3
];

const CHIP_LOAD_LIMITS: Range = { min: 0.0005, max: 0.02 };
const SURFACE_SPEED_LIMITS: Range = { min: 50, max: 1000 };

function readRange(value: unknown, field: string): Range {
  if (!isRecord(value)) {
    throw ErrorHandler.invalidSpec(field, 'must be a number or a range { min, max }', value);
  }
  const min = positive(requiredNumber(value, 'min', field), fieldName(field, 'min'));
  const max = positive(requiredNumber(value, 'max', field), fieldName(field, 'max'));
  if (max < min) {
    throw ErrorHandler.invalidSpec(field, 'max must not be below min', value);
  }
  return { min, max };
}

// A fixed value passes through; a range is drawn from
function draw(value: unknown, field: string, random: SeededRandom): unknown {
  if (value === undefined || typeof value === 'number') return value;
  const { min, max } = readRange(value, field);
  return random.uniform(min, max);
}

function readKinds(sample: Fields): readonly SampleShapeKind[] {
  const kinds = sample.kinds;
  if (kinds === undefined) return SAMPLE_KINDS;
  if (!Array.isArray(kinds) || kinds.length === 0) {
    throw ErrorHandler.invalidSpec('sample.kinds', 'must be a non-empty array', kinds);
  }
  return kinds.map((kind, i) => {
    const match = SAMPLE_KINDS.find(option => option === kind);
    if (match === undefined) {
      throw ErrorHandler.invalidSpec(`sample.kinds[${i}]`, `must be one of: ${SAMPLE_KINDS.join(', ')}`, kind);
    }
    return match;
  });
}

function readSize(sample: Fields): Range {
  if (sample.size === undefined) return DEFAULT_SIZE;
  const { min, max } = readRange(sample.size, 'sample.size');
  return {
    min: integerAtLeast(min, 1, 'sample.size.min'),
    max: integerAtLeast(max, 1, 'sample.size.max')
  };
}

// Rounded square (corners a fifth of the side) or an oval as long as the size and half as wide
function sampleShape(kind: SampleShapeKind, size: number): Fields {
  if (kind === 'rectangle') {
    return { kind, width: size, height: size, cornerRadius: size / 5 };
  }
  return { kind, length: size / 2, width: size / 2 };
}

/**
 * Replaces the `sample` block of a spec with concrete values drawn from its
 * seed: shape kind and size, then spindle speed and chip load from the tool's
 * ranges, then cutter compensation when the tool allows it. The draws happen
 * in that order, so one seed always yields one program.
 */
export function expandSample(input: Fields): Fields {
  const { sample: sampleValue, ...rest } = input;
  const sample = optionalRecord(input, 'sample', '');
  if (!sample) {
    throw ErrorHandler.invalidSpec('sample', 'must be an object', sampleValue);
  }
  if (rest.shape !== undefined || rest.shapes !== undefined) {
    throw ErrorHandler.invalidSpec('sample', 'draws its own shape; leave out `shape` and `shapes`');
  }

  const seed = integerAtLeast(requiredNumber(sample, 'seed', 'sample'), Number.MIN_SAFE_INTEGER, 'sample.seed');
  const random = new SeededRandom(seed);
  const kinds = readKinds(sample);
  const size = readSize(sample);

  const kind = random.pick(kinds);
  const side = random.integer(size.min, size.max);
  const expanded: Fields = {
    ...rest,
    shape: sampleShape(kind, side),
    programName: rest.programName ?? `sample ${kind} ${side}`
  };

  const tool = optionalRecord(input, 'tool', '');
  if (tool) {
    const { compensation, ...fixed } = tool;
    const surfaceSpeed = draw(tool.surfaceSpeed, 'tool.surfaceSpeed', random);
    const chipLoad = draw(tool.chipLoad, 'tool.chipLoad', random);
    expanded.tool = {
      ...fixed,
      surfaceSpeed,
      chipLoad,
      compensation: compensation === 'random' ? random.pick([undefined, 'left', 'right']) : compensation
    };
  }
  return expanded;
}

/** One tool with the ranges sample mode draws from */
export function randomTool(random: SeededRandom, number: number): ToolOptions {
  const diameter = random.pick(TOOL_DIAMETERS);
  const chipLoadMin = roundTo(random.uniform(CHIP_LOAD_LIMITS.min, CHIP_LOAD_LIMITS.max), 4);
  const chipLoadMax = Math.min(roundTo(chipLoadMin * random.uniform(1, 5), 4), CHIP_LOAD_LIMITS.max);
  const surfaceSpeedMin = roundTo(random.uniform(SURFACE_SPEED_LIMITS.min, SURFACE_SPEED_LIMITS.max), 4);
  const surfaceSpeedMax = Math.min(roundTo(surfaceSpeedMin * random.uniform(1, 3), 4), SURFACE_SPEED_LIMITS.max);
  const coolant = random.pick(['flood', 'off'] as const);
  const compensation = random.pick([true, false]) ? 'random' : undefined;

  return {
    number,
    diameter,
    surfaceSpeed: { min: surfaceSpeedMin, max: surfaceSpeedMax },
    chipLoad: { min: chipLoadMin, max: chipLoadMax },
    coolant,
    compensation
  };
}

/** Tool library numbered from 1, reproducible from its seed */
export function randomToolLibrary(seed: number, count: number): ToolOptions[] {
  const random = new SeededRandom(seed);
  return Array.from({ length: count }, (_, i) => randomTool(random, i + 1));
}
