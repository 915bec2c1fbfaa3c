import * as d3 from 'd3';
import type { SolarBody } from '../types/nasa';

export interface DiagramBody {
  name: SolarBody;
  radiusAu: number;
  size: number;
}

export interface DiagramPoint extends DiagramBody {
  theta: number;
  x: number;
  y: number;
  focus: boolean;
}

export interface SolarDiagram {
  title: string;
  points: DiagramPoint[];
}

export interface ProjectedPoint {
  name: SolarBody;
  px: number;
  py: number;
  r: number;
  focus: boolean;
}

const BODIES: readonly DiagramBody[] = [
  { name: 'Sun', radiusAu: 0, size: 30 },
  { name: 'Mercury', radiusAu: 0.39, size: 8 },
  { name: 'Venus', radiusAu: 0.72, size: 10 },
  { name: 'Earth', radiusAu: 1.0, size: 12 },
  { name: 'Mars', radiusAu: 1.52, size: 11 },
  { name: 'Jupiter', radiusAu: 5.2, size: 25 },
  { name: 'Saturn', radiusAu: 9.58, size: 22 },
  { name: 'Uranus', radiusAu: 19.23, size: 18 },
  { name: 'Neptune', radiusAu: 30.1, size: 18 },
];

/**
 * Lays the planets out on a flat plane at evenly spaced angles, not to scale.
 * The body matching `focus` is flagged; the Moon has no point of its own.
 */
export function buildSolarDiagram(focus: SolarBody | null = null): SolarDiagram {
  const angle = d3.scaleLinear().domain([0, BODIES.length]).range([0, 2 * Math.PI]);
  const wanted = focus?.toLowerCase();

  const points = d3.range(BODIES.length).map(i => {
    const body = BODIES[i];
    const theta = angle(i);
    return {
      ...body,
      theta,
      x: body.radiusAu * Math.cos(theta),
      y: body.radiusAu * Math.sin(theta),
      focus: body.name.toLowerCase() === wanted,
    };
  });

  return { title: 'Simplified Solar System Plane (Not to Scale)', points };
}

/** Maps AU coordinates into a centred square viewport, y growing downwards. */
export function projectSolarDiagram(diagram: SolarDiagram, width: number, height: number): ProjectedPoint[] {
  const extent = d3.max(diagram.points, p => Math.max(Math.abs(p.x), Math.abs(p.y))) || 1;
  const half = Math.min(width, height) / 2;
  const cx = width / 2;
  const cy = height / 2;

  const sx = d3.scaleLinear().domain([-extent, extent]).range([cx - half, cx + half]);
  const sy = d3.scaleLinear().domain([-extent, extent]).range([cy + half, cy - half]);

  return diagram.points.map(p => ({
    name: p.name,
    px: sx(p.x),
    py: sy(p.y),
    r: p.size / 2,
    focus: p.focus,
  }));
}
