// Geometry input types
export interface Point2 {
  x: number;
  y: number;
}

// Absolute machine position. `e` is the extruder axis, always 0 outside extrusion mode.
export interface Position {
  x: number;
  y: number;
  z: number;
  e: number;
}

export type Units = 'millimeter' | 'inch';

export type ArcMode = 'native' | 'linearized';

export type CommentStyle = 'paren' | 'semicolon';

export type Resolution = { segmentCount: number } | { chordTolerance: number };

// Shape descriptors (закрытый набор вариантов по полю kind)
export interface LineShape {
  kind: 'line';
  name?: string;
  from?: Point2;
  to?: Point2;
  length?: number;
  angle?: number; // degrees
  subdivisions?: number;
}

export interface RectangleShape {
  kind: 'rectangle';
  name?: string;
  origin?: Point2; // lower-left corner
  width: number;
  height: number;
  cornerRadius?: number;
}

export interface CircleShape {
  kind: 'circle';
  name?: string;
  center?: Point2;
  radius: number;
  startAngle?: number; // degrees
  sweep?: number; // degrees, positive = counter-clockwise
}

export interface ArcShape {
  kind: 'arc';
  name?: string;
  center?: Point2;
  radius: number;
  startAngle?: number;
  sweep: number;
}

export interface PolygonShape {
  kind: 'polygon';
  name?: string;
  vertices: Point2[];
  closed?: boolean;
}

export interface RegularPolygonShape {
  kind: 'regularPolygon';
  name?: string;
  center?: Point2;
  sides: number;
  radius: number;
  rotation?: number; // degrees
}

// Oval with rounded ends: `length` is the distance between the end centres
export interface SlotShape {
  kind: 'slot';
  name?: string;
  center?: Point2;
  length: number;
  width: number;
  angle?: number;
}

export type PlanarShape =
  | LineShape
  | RectangleShape
  | CircleShape
  | ArcShape
  | PolygonShape
  | RegularPolygonShape
  | SlotShape;

export interface StackShape {
  kind: 'stack';
  name?: string;
  base: PlanarShape;
  layers: number;
  layerHeight?: number;
}

export type ShapeSpec = PlanarShape | StackShape;

export type ShapeKind = ShapeSpec['kind'];

export interface JitterOptions {
  seed: number;
  magnitude: number;
}

export interface Range {
  min: number;
  max: number;
}

export interface ToolOptions {
  number: number;
  spindleSpeed?: number;
  // ranges are only drawn from in sample mode
  surfaceSpeed?: number | Range;
  diameter?: number;
  // feed per revolution; feedRate = chipLoad x spindleSpeed when no feedRate is given
  chipLoad?: number | Range;
  direction?: 'cw' | 'ccw';
  coolant?: 'flood' | 'mist' | 'off';
  compensation?: 'left' | 'right' | 'random';
}

export type SampleShapeKind = 'rectangle' | 'slot';

// Seeded random sample program: shape, size, speeds and compensation are drawn from ranges
export interface SampleOptions {
  seed: number;
  kinds?: SampleShapeKind[];
  size?: Range;
}

export interface ExtrusionOptions {
  perUnit: number;
  relative?: boolean;
}

export interface DialectOptions {
  programEnd?: 'M2' | 'M30';
  rapidFeed?: boolean;
}

// Generation Spec: what the caller hands to the engine
export interface GenerationSpec {
  shape?: ShapeSpec | ShapeKind;
  shapes?: ShapeSpec[];
  units?: Units;
  feedRate?: number;
  travelRate?: number;
  plungeRate?: number;
  resolution?: Resolution;
  segmentCount?: number;
  chordTolerance?: number;
  startPosition?: { x: number; y: number; z?: number };
  layers?: number;
  layerHeight?: number;
  safeZ?: number;
  arcMode?: ArcMode;
  jitter?: JitterOptions;
  precision?: number;
  maxInstructions?: number;
  fullAxisOutput?: boolean;
  lineNumbers?: boolean;
  commentStyle?: CommentStyle;
  programName?: string;
  tool?: ToolOptions;
  extrusion?: ExtrusionOptions;
  dialect?: DialectOptions;
  sample?: SampleOptions;
  // Flat geometry parameters, used when `shape` is given as a kind name
  [param: string]: unknown;
}

// Error types
export enum GenerationErrorCode {
  InvalidSpec = 'INVALID_SPEC',
  InvalidGeometry = 'INVALID_GEOMETRY',
  ProgramTooLarge = 'PROGRAM_TOO_LARGE'
}

export interface GenerationErrorDetails {
  field?: string;
  value?: unknown;
  limit?: number;
  count?: number;
}
