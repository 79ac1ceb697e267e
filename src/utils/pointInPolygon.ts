/**
 * src/utils/pointInPolygon.ts
 *
 * Ray-casting point-in-polygon tests over GeoJSON rings. A ray is cast from the
 * test point towards +x and every edge it crosses flips the inside flag.
 * Coordinates are treated as planar [lng, lat] pairs.
 *
 * Points lying exactly on an edge may land on either side.
 */

import type { Geometry, Position } from 'geojson';
import type { BoundaryGeometry } from '../types';
import { MalformedFeatureError, UnsupportedGeometryError } from './errors';

export interface GeometryFault {
  kind: 'unsupported' | 'malformed';
  message: string;
}

/**
 * Crossing-number test for a single ring. The ring is walked cyclically, so a
 * missing closing vertex makes no difference.
 */
export function pointInRing(point: Position, ring: Position[]): boolean {
  if (ring.length < 3) return false;

  const [x, y] = point;
  let inside = false;

  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const [xi, yi] = ring[i];
    const [xj, yj] = ring[j];

    // Strict straddle test: horizontal edges never get here, so no division by zero
    if (yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi) {
      inside = !inside;
    }
  }

  return inside;
}

/**
 * Inside the exterior ring and outside every hole.
 */
export function pointInPolygon(point: Position, rings: Position[][]): boolean {
  if (rings.length === 0) return false;
  if (!pointInRing(point, rings[0])) return false;

  for (let i = 1; i < rings.length; i++) {
    if (pointInRing(point, rings[i])) return false;
  }
  return true;
}

export function pointInMultiPolygon(point: Position, polygons: Position[][][]): boolean {
  return polygons.some(rings => pointInPolygon(point, rings));
}

/**
 * @throws UnsupportedGeometryError for anything but Polygon and MultiPolygon
 */
export function pointInGeometry(point: Position, geometry: Geometry): boolean {
  switch (geometry.type) {
    case 'Polygon':
      return pointInPolygon(point, geometry.coordinates);
    case 'MultiPolygon':
      return pointInMultiPolygon(point, geometry.coordinates);
    default:
      throw new UnsupportedGeometryError(geometry.type);
  }
}

function isPosition(value: unknown): boolean {
  return (
    Array.isArray(value) &&
    value.length >= 2 &&
    Number.isFinite(value[0]) &&
    Number.isFinite(value[1])
  );
}

function ringFault(ring: unknown, label: string): string | null {
  if (!Array.isArray(ring)) return `${label} is not an array`;
  if (ring.length > 0 && ring.length < 3) {
    return `${label} is degenerate (${ring.length} positions)`;
  }
  const bad = ring.findIndex(position => !isPosition(position));
  return bad === -1 ? null : `${label} position ${bad} is not a numeric [x, y] pair`;
}

function polygonFault(rings: unknown, label: string): string | null {
  if (!Array.isArray(rings)) return `${label} coordinates are not an array`;
  for (let i = 0; i < rings.length; i++) {
    const fault = ringFault(rings[i], `${label} ring ${i}`);
    if (fault) return fault;
  }
  return null;
}

/**
 * Structural check of a geometry read from an untrusted dataset. Returns null
 * when the geometry can be handed to pointInGeometry.
 */
export function geometryFault(geometry: Geometry | null | undefined): GeometryFault | null {
  if (!geometry || typeof geometry !== 'object') {
    return { kind: 'malformed', message: 'geometry is missing or has no type tag' };
  }

  switch (geometry.type) {
    case 'Polygon': {
      const message = polygonFault(geometry.coordinates, 'polygon');
      return message ? { kind: 'malformed', message } : null;
    }
    case 'MultiPolygon': {
      const polygons: unknown = geometry.coordinates;
      if (!Array.isArray(polygons)) {
        return { kind: 'malformed', message: 'multipolygon coordinates are not an array' };
      }
      for (let i = 0; i < polygons.length; i++) {
        const message = polygonFault(polygons[i], `polygon ${i}`);
        if (message) return { kind: 'malformed', message };
      }
      return null;
    }
    default:
      return { kind: 'unsupported', message: `unsupported geometry type ${JSON.stringify(geometry.type)}` };
  }
}

export function isBoundaryGeometry(geometry: Geometry | null | undefined): geometry is BoundaryGeometry {
  return geometryFault(geometry) === null;
}

/**
 * @throws UnsupportedGeometryError when the type tag is not Polygon/MultiPolygon
 * @throws MalformedFeatureError when the coordinates cannot be tested
 */
export function assertBoundaryGeometry(
  geometry: Geometry | null | undefined
): asserts geometry is BoundaryGeometry {
  const fault = geometryFault(geometry);
  if (!fault) return;
  if (fault.kind === 'unsupported' && geometry) {
    throw new UnsupportedGeometryError(geometry.type);
  }
  throw new MalformedFeatureError(fault.message);
}
