import { ShapeJob } from '../spec/types';
import { PlanarShape } from '../types';
import { formatNumber } from '../utils/format';

function describePlanar(shape: PlanarShape, precision: number): string {
  const n = (value: number) => formatNumber(value, precision);

  switch (shape.kind) {
    case 'line':
      if (shape.to) return `line to ${n(shape.to.x)}, ${n(shape.to.y)}`;
      return `line ${n(shape.length ?? 0)} long at ${n(shape.angle ?? 0)} deg`;
    case 'rectangle': {
      const corners = shape.cornerRadius ? ` r${n(shape.cornerRadius)}` : '';
      return `rectangle ${n(shape.width)} x ${n(shape.height)}${corners}`;
    }
    case 'circle': {
      const sweep = shape.sweep ?? 360;
      return Math.abs(sweep) === 360 ? `circle r${n(shape.radius)}` : `circle r${n(shape.radius)} sweep ${n(sweep)}`;
    }
    case 'arc':
      return `arc r${n(shape.radius)} sweep ${n(shape.sweep)}`;
    case 'polygon':
      return `polygon ${shape.vertices.length} vertices${shape.closed === false ? ' open' : ''}`;
    case 'regularPolygon':
      return `regular ${shape.sides}-gon r${n(shape.radius)}`;
    case 'slot':
      return `slot ${n(shape.length)} x ${n(shape.width)}`;
  }
}

/** Text of the comment written before a shape: `shape 2 pocket: rectangle 10 x 5` */
export function describeShape(job: ShapeJob, precision: number): string {
  const label = job.name ? `shape ${job.index + 1} ${job.name}` : `shape ${job.index + 1}`;
  return `${label}: ${describePlanar(job.shape, precision)}`;
}

export function describeLayer(layer: number, layerCount: number, z: number, precision: number): string {
  return `layer ${layer}/${layerCount} Z${formatNumber(z, precision)}`;
}
