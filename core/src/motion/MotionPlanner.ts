import { arcEnd, arcLength, arcStart, distance, sampleArc, sampleLine, samePoint } from '../geometry/primitives';
import { shapePath } from '../geometry/shapes';
import { ShapePath } from '../geometry/types';
import { ResolvedSpec, ShapeJob } from '../spec/types';
import { Point2, Position } from '../types';
import { roundTo } from '../utils/format';
import { Logger } from '../utils/logger';
import { SeededRandom } from '../utils/random';
import { MotionGroup, MotionPlan, MotionStep, RapidStep } from './types';

type PlanarMove =
  | { kind: 'line'; to: Point2 }
  | { kind: 'arc'; to: Point2; center: Point2; direction: 'cw' | 'ccw'; length: number; fullTurn: boolean };

// Planar path of one shape, shared by all of its layers
interface ShapeTemplate {
  start: Point2;
  moves: PlanarMove[];
}

function skipFirst<T>(items: Iterable<T>): T[] {
  return Array.from(items).slice(1);
}

/**
 * Turns the shapes of a resolved spec into Motion Steps: a feed lead-in from the
 * start position onto the first shape, a rapid (or safe-Z approach) onto every
 * later one, then linear and arc moves along each path, repeated per layer with
 * a Z offset.
 */
export class MotionPlanner {
  private readonly logger = new Logger('MotionPlanner');
  private position: Position;
  private entered = false;

  constructor(
    private readonly spec: ResolvedSpec,
    private readonly random?: SeededRandom
  ) {
    this.position = { ...spec.startPosition };
  }

  plan(): MotionPlan {
    const { startPosition, safeZ: clearance } = this.spec;
    const header: RapidStep = {
      mode: 'rapid',
      target: { ...startPosition, z: clearance ?? startPosition.z },
      phase: 'approach'
    };
    this.position = header.target;
    this.entered = false;

    const groups: MotionGroup[] = [];
    for (const job of this.spec.shapes) {
      groups.push(...this.planShape(job));
    }

    const { safeZ, precision } = this.spec;
    let retract: RapidStep | null = null;
    if (safeZ !== undefined && roundTo(this.position.z, precision) !== roundTo(safeZ, precision)) {
      retract = { mode: 'rapid', target: { ...this.position, z: safeZ }, phase: 'retract' };
      this.position = retract.target;
    }

    return { header, groups, retract };
  }

  /** One group of steps per layer of the shape */
  planShape(job: ShapeJob): MotionGroup[] {
    const origin = { x: this.spec.startPosition.x, y: this.spec.startPosition.y };
    const template = this.buildTemplate(shapePath(job.shape, origin));
    const groups: MotionGroup[] = [];

    for (let layer = 1; layer <= job.layers; layer++) {
      const z = this.spec.startPosition.z + (layer - 1) * job.layerHeight;
      const steps = this.planLayer(template, z);
      groups.push({ shapeIndex: job.index, layer, layerCount: job.layers, z, steps });
    }

    this.logger.debug(
      `Shape ${job.index + 1} (${job.shape.kind}): ${template.moves.length} moves x ${job.layers} layer(s)`
    );
    return groups;
  }

  private buildTemplate(path: ShapePath): ShapeTemplate {
    const { precision, arcMode, resolution } = this.spec;
    const moves: PlanarMove[] = [];
    let cursor = path.start;

    // Zero-length moves collapse into the point they start from
    const lineTo = (to: Point2) => {
      if (samePoint(cursor, to, precision)) return;
      moves.push({ kind: 'line', to });
      cursor = to;
    };

    for (const segment of path.segments) {
      if (segment.kind === 'line') {
        skipFirst(sampleLine(segment)).forEach(lineTo);
      } else if (arcMode === 'native') {
        const to = arcEnd(segment);
        moves.push({
          kind: 'arc',
          to,
          center: segment.center,
          direction: segment.sweep < 0 ? 'cw' : 'ccw',
          length: arcLength(segment),
          // A controller reads coinciding endpoints as a whole circle
          fullTurn: Math.abs(segment.sweep) > Math.PI && samePoint(arcStart(segment), to, precision)
        });
        cursor = to;
      } else {
        skipFirst(sampleArc(segment, resolution)).forEach(lineTo);
      }
    }

    return { start: path.start, moves: this.random ? this.jitter(moves, this.random) : moves };
  }

  // Arc endpoints and the points an arc starts from stay put so native arcs keep their radius
  private jitter(moves: PlanarMove[], random: SeededRandom): PlanarMove[] {
    const magnitude = this.spec.jitter?.magnitude ?? 0;
    return moves.map((move, i): PlanarMove => {
      if (move.kind !== 'line' || moves[i + 1]?.kind === 'arc') {
        return move;
      }
      const offset = random.inDisc(magnitude);
      return { kind: 'line', to: { x: move.to.x + offset.x, y: move.to.y + offset.y } };
    });
  }

  private planLayer(template: ShapeTemplate, z: number): MotionStep[] {
    const { feedRate, extrusion } = this.spec;
    const steps: MotionStep[] = [];

    const entry = { x: template.start.x, y: template.start.y, z, e: this.position.e };
    if (this.entered) {
      this.approach(entry, steps);
    } else {
      this.leadIn(entry, steps);
      this.entered = this.leavesMark(template);
    }

    for (const move of template.moves) {
      const from = this.position;
      const length = move.kind === 'arc' ? move.length : distance(from, move.to);
      const target: Position = {
        x: move.to.x,
        y: move.to.y,
        z,
        e: extrusion ? from.e + extrusion.perUnit * length : from.e
      };

      if (move.kind === 'line') {
        steps.push({ mode: 'linear', target, feedRate, phase: 'cut' });
      } else {
        steps.push({
          mode: move.direction === 'cw' ? 'arcCW' : 'arcCCW',
          direction: move.direction,
          target,
          feedRate,
          phase: 'cut',
          centerOffset: { i: move.center.x - from.x, j: move.center.y - from.y },
          fullTurn: move.fullTurn
        });
      }
      this.position = target;
    }

    return steps;
  }

  // Whether any move survives rounding; an arc whose centre rounds onto its start writes nothing
  private leavesMark(template: ShapeTemplate): boolean {
    const { precision } = this.spec;
    let from = template.start;
    return template.moves.some(move => {
      const visible = move.kind === 'line' || !samePoint(move.center, from, precision);
      from = move.to;
      return visible;
    });
  }

  // The first feed move of a program starts at the declared start position: drop from safe Z
  // onto it, then feed across to the first shape
  private leadIn(target: Position, steps: MotionStep[]): void {
    const { feedRate, precision, startPosition } = this.spec;

    if (roundTo(this.position.z, precision) !== roundTo(startPosition.z, precision)) {
      steps.push({ mode: 'rapid', target: { ...this.position, z: startPosition.z }, phase: 'approach' });
      this.position = { ...this.position, z: startPosition.z };
    }
    const sameZ = roundTo(this.position.z, precision) === roundTo(target.z, precision);
    if (!samePoint(this.position, target, precision) || !sameZ) {
      steps.push({ mode: 'linear', target, feedRate, phase: 'leadIn' });
    }
    this.position = target;
  }

  // Rapid onto the first point of a shape, or retract / travel / plunge when a safe Z is set
  private approach(target: Position, steps: MotionStep[]): void {
    const { safeZ, plungeRate, precision } = this.spec;
    const current = this.position;
    const sameZ = roundTo(current.z, precision) === roundTo(target.z, precision);

    if (samePoint(current, target, precision) && sameZ) {
      return;
    }

    if (safeZ === undefined) {
      steps.push({ mode: 'rapid', target, phase: 'approach' });
      this.position = target;
      return;
    }

    if (roundTo(current.z, precision) !== roundTo(safeZ, precision)) {
      steps.push({ mode: 'rapid', target: { ...current, z: safeZ }, phase: 'approach' });
    }
    if (!samePoint(current, target, precision)) {
      steps.push({ mode: 'rapid', target: { ...target, z: safeZ }, phase: 'approach' });
    }
    steps.push({ mode: 'linear', target, feedRate: plungeRate, phase: 'approach' });
    this.position = target;
  }
}
