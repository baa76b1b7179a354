import {
  LineShape,
  PlanarShape,
  Point2,
  PolygonShape,
  RectangleShape,
  RegularPolygonShape,
  SlotShape
} from '../types';
import { ErrorHandler } from '../utils/error-handler';
import { arcEnd, arcStart, degToRad, FULL_TURN, isFullTurn, makeArc } from './primitives';
import { LineSegment, PathSegment, ShapePath } from './types';

const HALF_TURN = Math.PI;
const QUARTER_TURN = Math.PI / 2;

function line(from: Point2, to: Point2, subdivisions: number = 1): LineSegment {
  return { kind: 'line', from, to, subdivisions };
}

function requirePositive(value: number, field: string, shape: string): void {
  if (!(value > 0)) {
    throw ErrorHandler.invalidGeometry(`${shape} ${field} must be positive, got ${value}`, { field, value });
  }
}

function polyline(points: Point2[], closed: boolean): ShapePath {
  const segments: PathSegment[] = [];
  for (let i = 1; i < points.length; i++) {
    segments.push(line(points[i - 1], points[i]));
  }
  const first = points[0];
  const last = points[points.length - 1];
  if (closed && (first.x !== last.x || first.y !== last.y)) {
    segments.push(line(last, first));
  }
  return { start: first, segments, closed };
}

/**
 * Builds the boundary path of a shape out of line and arc primitives.
 * `origin` is the default anchor (the program start position in XY).
 */
export function shapePath(shape: PlanarShape, origin: Point2): ShapePath {
  switch (shape.kind) {
    case 'line':
      return linePath(shape, origin);
    case 'rectangle':
      return rectanglePath(shape, origin);
    case 'circle':
    case 'arc': {
      requirePositive(shape.radius, 'radius', shape.kind);
      const arc = makeArc(
        shape.center ?? origin,
        shape.radius,
        degToRad(shape.startAngle ?? 0),
        degToRad(shape.sweep ?? 360)
      );
      return { start: arcStart(arc), segments: [arc], closed: isFullTurn(arc) };
    }
    case 'polygon':
      return polygonPath(shape);
    case 'regularPolygon':
      return regularPolygonPath(shape, origin);
    case 'slot':
      return slotPath(shape, origin);
    default:
      return assertNever(shape);
  }
}

function assertNever(shape: never): never {
  throw ErrorHandler.invalidGeometry(`Unsupported shape: ${JSON.stringify(shape)}`);
}

function linePath(shape: LineShape, origin: Point2): ShapePath {
  const from = shape.from ?? origin;
  let to: Point2;
  if (shape.to) {
    to = shape.to;
  } else {
    const length = shape.length ?? 0;
    const angle = degToRad(shape.angle ?? 0);
    to = { x: from.x + length * Math.cos(angle), y: from.y + length * Math.sin(angle) };
  }
  return { start: from, segments: [line(from, to, shape.subdivisions ?? 1)], closed: false };
}

// Counter-clockwise from the lower-left corner; rounded corners are quarter arcs
function rectanglePath(shape: RectangleShape, origin: Point2): ShapePath {
  requirePositive(shape.width, 'width', 'rectangle');
  requirePositive(shape.height, 'height', 'rectangle');

  const { x, y } = shape.origin ?? origin;
  const { width: w, height: h } = shape;
  const r = shape.cornerRadius ?? 0;

  if (r === 0) {
    return polyline(
      [
        { x, y },
        { x: x + w, y },
        { x: x + w, y: y + h },
        { x, y: y + h }
      ],
      true
    );
  }

  if (r < 0 || r * 2 > Math.min(w, h)) {
    throw ErrorHandler.invalidGeometry(`Corner radius ${r} does not fit a ${w} x ${h} rectangle`, {
      field: 'cornerRadius',
      value: r
    });
  }

  const corners = [
    makeArc({ x: x + w - r, y: y + r }, r, -QUARTER_TURN, QUARTER_TURN),
    makeArc({ x: x + w - r, y: y + h - r }, r, 0, QUARTER_TURN),
    makeArc({ x: x + r, y: y + h - r }, r, QUARTER_TURN, QUARTER_TURN),
    makeArc({ x: x + r, y: y + r }, r, HALF_TURN, QUARTER_TURN)
  ];

  const start = { x: x + r, y };
  const segments: PathSegment[] = [];
  let cursor = start;
  for (const corner of corners) {
    segments.push(line(cursor, arcStart(corner)));
    segments.push(corner);
    cursor = arcEnd(corner);
  }
  return { start, segments, closed: true };
}

function polygonPath(shape: PolygonShape): ShapePath {
  if (shape.vertices.length < 2) {
    throw ErrorHandler.invalidGeometry(`Polygon needs at least 2 vertices, got ${shape.vertices.length}`, {
      field: 'vertices',
      count: shape.vertices.length
    });
  }
  return polyline(shape.vertices, shape.closed ?? true);
}

function regularPolygonPath(shape: RegularPolygonShape, origin: Point2): ShapePath {
  requirePositive(shape.radius, 'radius', 'regularPolygon');
  if (!Number.isInteger(shape.sides) || shape.sides < 3) {
    throw ErrorHandler.invalidGeometry(`Regular polygon needs at least 3 sides, got ${shape.sides}`, {
      field: 'sides',
      value: shape.sides
    });
  }

  const center = shape.center ?? origin;
  const rotation = degToRad(shape.rotation ?? 0);
  const vertices: Point2[] = [];
  for (let i = 0; i < shape.sides; i++) {
    const angle = rotation + (FULL_TURN * i) / shape.sides;
    vertices.push({ x: center.x + shape.radius * Math.cos(angle), y: center.y + shape.radius * Math.sin(angle) });
  }
  return polyline(vertices, true);
}

// Oval from two half circles joined by straight sides, counter-clockwise
function slotPath(shape: SlotShape, origin: Point2): ShapePath {
  requirePositive(shape.length, 'length', 'slot');
  requirePositive(shape.width, 'width', 'slot');

  const center = shape.center ?? origin;
  const angle = degToRad(shape.angle ?? 0);
  const r = shape.width / 2;
  const half = shape.length / 2;
  const toWorld = (local: Point2): Point2 => ({
    x: center.x + local.x * Math.cos(angle) - local.y * Math.sin(angle),
    y: center.y + local.x * Math.sin(angle) + local.y * Math.cos(angle)
  });

  const rightEnd = makeArc(toWorld({ x: half, y: 0 }), r, angle - QUARTER_TURN, HALF_TURN);
  const leftEnd = makeArc(toWorld({ x: -half, y: 0 }), r, angle + QUARTER_TURN, HALF_TURN);
  const start = toWorld({ x: -half, y: -r });

  return {
    start,
    segments: [line(start, arcStart(rightEnd)), rightEnd, line(arcEnd(rightEnd), arcStart(leftEnd)), leftEnd],
    closed: true
  };
}
