/**
 * src/functions/locateBoundary.ts
 *
 * Linear scan over the loaded boundary features. Dataset order is significant:
 * the first feature containing the point wins, even if a later one also does.
 * Bounding boxes computed at load time let the scan skip most features without
 * running the ray-casting test.
 */

import type { BBox, Position } from 'geojson';
import type { BoundaryFeature } from '../types';
import { logger } from '../utils/logger';
import { MalformedFeatureError, UnsupportedGeometryError } from '../utils/errors';
import { assertBoundaryGeometry, pointInGeometry } from '../utils/pointInPolygon';

export interface FeatureAnomaly {
  index: number;
  feature: string;
  kind: 'unsupported-geometry' | 'malformed-feature';
  message: string;
  geometryType?: string;
}

export interface LocateResult {
  feature: BoundaryFeature | null;
  anomalies: FeatureAnomaly[];
}

export interface LocateAllResult {
  features: BoundaryFeature[];
  anomalies: FeatureAnomaly[];
}

function bboxContains([minX, minY, maxX, maxY]: BBox, [x, y]: Position): boolean {
  return x >= minX && x <= maxX && y >= minY && y <= maxY;
}

// A feature that cannot be tested counts as not containing the point; the anomaly is recorded
function testFeature(
  point: Position,
  feature: BoundaryFeature,
  index: number,
  anomalies: FeatureAnomaly[]
): boolean {
  if (feature.bbox && !bboxContains(feature.bbox, point)) return false;

  try {
    assertBoundaryGeometry(feature.geometry);
    return pointInGeometry(point, feature.geometry);
  } catch (error) {
    let anomaly: FeatureAnomaly;
    if (error instanceof UnsupportedGeometryError) {
      anomaly = {
        index,
        feature: feature.name,
        kind: 'unsupported-geometry',
        message: error.message,
        geometryType: error.geometryType,
      };
    } else if (error instanceof MalformedFeatureError) {
      anomaly = { index, feature: feature.name, kind: 'malformed-feature', message: error.message };
    } else {
      throw error;
    }
    anomalies.push(anomaly);
    logger.warn('Skipping boundary feature that cannot be tested', { ...anomaly });
    return false;
  }
}

// A miss that skipped unsupported geometries is a data problem, not "outside"
function throwIfUnsupported(anomalies: FeatureAnomaly[]): void {
  const unsupported = anomalies.filter(anomaly => anomaly.kind === 'unsupported-geometry');
  if (unsupported.length === 0) return;

  const names = unsupported.map(anomaly => anomaly.feature).join(', ');
  throw new UnsupportedGeometryError(
    unsupported[0].geometryType ?? 'unknown',
    `no match; skipped ${unsupported.length} feature(s): ${names}`
  );
}

/**
 * First feature, in dataset order, whose geometry contains the point.
 *
 * @param point - [longitude, latitude]
 * @throws UnsupportedGeometryError when nothing matched and an unsupported geometry was skipped
 */
export function locateBoundary(
  point: Position,
  features: readonly BoundaryFeature[]
): LocateResult {
  const anomalies: FeatureAnomaly[] = [];

  for (let i = 0; i < features.length; i++) {
    if (testFeature(point, features[i], i, anomalies)) {
      return { feature: features[i], anomalies };
    }
  }

  throwIfUnsupported(anomalies);
  return { feature: null, anomalies };
}

/**
 * Every feature containing the point, in dataset order.
 */
export function locateAllBoundaries(
  point: Position,
  features: readonly BoundaryFeature[]
): LocateAllResult {
  const anomalies: FeatureAnomaly[] = [];
  const matches = features.filter((feature, i) => testFeature(point, feature, i, anomalies));

  if (matches.length === 0) {
    throwIfUnsupported(anomalies);
  }
  return { features: matches, anomalies };
}
