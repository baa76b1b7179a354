import { Point2 } from '../types';
import { ErrorHandler } from '../utils/error-handler';
import { roundTo } from '../utils/format';
import { ArcSegment, LineSegment, SamplingResolution, ShapePath } from './types';

export const FULL_TURN = Math.PI * 2;

// Guards ceil() against 2.0000000000004-style quotients
const COUNT_EPSILON = 1e-9;

export function degToRad(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function distance(a: Point2, b: Point2): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

/** Equality after rounding both points to the output precision */
export function samePoint(a: Point2, b: Point2, precision: number): boolean {
  return roundTo(a.x, precision) === roundTo(b.x, precision) && roundTo(a.y, precision) === roundTo(b.y, precision);
}

export function isFullTurn(arc: ArcSegment): boolean {
  return Math.abs(Math.abs(arc.sweep) - FULL_TURN) < 1e-12;
}

export function arcPoint(arc: ArcSegment, angle: number): Point2 {
  return {
    x: arc.center.x + arc.radius * Math.cos(angle),
    y: arc.center.y + arc.radius * Math.sin(angle)
  };
}

export function arcStart(arc: ArcSegment): Point2 {
  return arcPoint(arc, arc.startAngle);
}

/** A full circle ends exactly where it starts */
export function arcEnd(arc: ArcSegment): Point2 {
  return isFullTurn(arc) ? arcStart(arc) : arcPoint(arc, arc.startAngle + arc.sweep);
}

export function arcLength(arc: ArcSegment): number {
  return Math.abs(arc.sweep) * arc.radius;
}

export function makeArc(center: Point2, radius: number, startAngle: number, sweep: number): ArcSegment {
  const arc: ArcSegment = { kind: 'arc', center, radius, startAngle, sweep };
  assertArc(arc);
  return arc;
}

function assertArc(arc: ArcSegment): void {
  if (!(arc.radius > 0) || !Number.isFinite(arc.radius)) {
    throw ErrorHandler.invalidGeometry(`Arc radius must be positive, got ${arc.radius}`, {
      field: 'radius',
      value: arc.radius
    });
  }
  if (arc.sweep === 0 || !Number.isFinite(arc.sweep) || Math.abs(arc.sweep) > FULL_TURN + 1e-12) {
    throw ErrorHandler.invalidGeometry(`Arc sweep must be non-zero and at most one full turn, got ${arc.sweep}`, {
      field: 'sweep',
      value: arc.sweep
    });
  }
}

/**
 * Minimum number of chords whose sagitta stays within `tolerance`:
 * N = ceil(|sweep| / (2 * acos(1 - tolerance / radius))), at least 1.
 * A chord never spans more than half a turn.
 */
export function chordSegmentCount(sweep: number, radius: number, tolerance: number): number {
  if (!(radius > 0)) {
    throw ErrorHandler.invalidGeometry(`Arc radius must be positive, got ${radius}`, { field: 'radius', value: radius });
  }
  if (!(tolerance > 0)) {
    throw ErrorHandler.invalidGeometry(`Chord tolerance must be positive, got ${tolerance}`, {
      field: 'chordTolerance',
      value: tolerance
    });
  }

  const ratio = Math.max(-1, 1 - tolerance / radius);
  const step = Math.min(Math.PI, 2 * Math.acos(ratio));
  return Math.max(1, Math.ceil(Math.abs(sweep) / step - COUNT_EPSILON));
}

/** Fixed angular step: `segmentCount` chords per full turn */
export function angularSegmentCount(sweep: number, segmentCount: number): number {
  if (!Number.isInteger(segmentCount) || segmentCount <= 0) {
    throw ErrorHandler.invalidGeometry(`Segment count must be a positive integer, got ${segmentCount}`, {
      field: 'segmentCount',
      value: segmentCount
    });
  }
  return Math.max(1, Math.ceil((Math.abs(sweep) * segmentCount) / FULL_TURN - COUNT_EPSILON));
}

export function arcSegmentCount(arc: ArcSegment, resolution: SamplingResolution): number {
  if ('segmentCount' in resolution) {
    return angularSegmentCount(arc.sweep, resolution.segmentCount);
  }
  return chordSegmentCount(arc.sweep, arc.radius, resolution.chordTolerance);
}

/**
 * Samples an arc from its start to its end, both included.
 * The returned iterable is lazy and can be iterated any number of times.
 */
export function sampleArc(arc: ArcSegment, resolution: SamplingResolution): Iterable<Point2> {
  assertArc(arc);
  const count = arcSegmentCount(arc, resolution);

  return {
    *[Symbol.iterator]() {
      for (let i = 0; i < count; i++) {
        yield arcPoint(arc, arc.startAngle + (arc.sweep * i) / count);
      }
      yield arcEnd(arc);
    }
  };
}

/** Zero-length segments collapse to a single point */
export function sampleLine(line: LineSegment): Iterable<Point2> {
  const { from, to, subdivisions } = line;
  if (!Number.isInteger(subdivisions) || subdivisions <= 0) {
    throw ErrorHandler.invalidGeometry(`Line subdivisions must be a positive integer, got ${subdivisions}`, {
      field: 'subdivisions',
      value: subdivisions
    });
  }

  if (from.x === to.x && from.y === to.y) {
    return [from];
  }

  return {
    *[Symbol.iterator]() {
      for (let i = 0; i < subdivisions; i++) {
        const t = i / subdivisions;
        yield { x: from.x + (to.x - from.x) * t, y: from.y + (to.y - from.y) * t };
      }
      yield to;
    }
  };
}

/** Every sample of a path; the shared endpoint of adjacent segments appears once */
export function samplePath(path: ShapePath, resolution: SamplingResolution): Iterable<Point2> {
  return {
    *[Symbol.iterator]() {
      yield path.start;
      for (const segment of path.segments) {
        const samples = segment.kind === 'line' ? sampleLine(segment) : sampleArc(segment, resolution);
        let first = true;
        for (const point of samples) {
          if (first) {
            first = false;
            continue;
          }
          yield point;
        }
      }
    }
  };
}
