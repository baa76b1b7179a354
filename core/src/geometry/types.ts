import { Point2 } from '../types';

export interface LineSegment {
  kind: 'line';
  from: Point2;
  to: Point2;
  subdivisions: number;
}

// Angles in radians; sweep is signed, positive = counter-clockwise
export interface ArcSegment {
  kind: 'arc';
  center: Point2;
  radius: number;
  startAngle: number;
  sweep: number;
}

export type PathSegment = LineSegment | ArcSegment;

export interface ShapePath {
  start: Point2;
  segments: PathSegment[];
  closed: boolean;
}

export type SamplingResolution = { segmentCount: number } | { chordTolerance: number };
