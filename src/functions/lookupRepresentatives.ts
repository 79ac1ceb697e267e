/**
 * src/functions/lookupRepresentatives.ts
 *
 * Resolves a latitude/longitude to the assembly constituency containing it,
 * maps that to its parliamentary constituency and returns the representative
 * record for both. Results are memoized per coordinate in the query cache.
 */

import type { BoundaryFeature, Geometry, RepresentativeLookup } from '../types';
import type { DataStore } from '../lib/data-store';
import { config } from '../config';
import { logger } from '../utils/logger';
import { coordinateKey } from '../utils/coordinates';
import type { TTLCache } from '../utils/TTLCache';
import { locateBoundary } from './locateBoundary';
import { NOT_APPLICABLE, matchRepresentative, placeholderRecord } from './resolveRepresentative';

export interface LookupContext {
  store: DataStore;
  cache: TTLCache<RepresentativeLookup>;
  keyPrecision?: number;
}

/**
 * Uncached resolution pipeline.
 *
 * @throws UnsupportedGeometryError when the dataset holds geometries the locator cannot test
 */
export const resolvePoint = (
  { lat, lon }: { lat: number; lon: number },
  store: DataStore
): RepresentativeLookup => {
  // GeoJSON positions are [longitude, latitude]
  const { feature } = locateBoundary([lon, lat], store.boundaries);

  if (!feature) {
    logger.info('No constituency found', { lat, lon });
    return { boundaryMatch: null, regionMatch: null };
  }

  const boundary = matchRepresentative(feature.name, store.assemblyRecords, feature.code);

  const regionName = store.regions.regionFor(feature.name);
  if (regionName === null) {
    logger.warn('No parliamentary constituency mapped for assembly constituency', {
      constituency: feature.name,
    });
  }
  const regionMatch =
    regionName === null
      ? placeholderRecord(NOT_APPLICABLE)
      : matchRepresentative(regionName, store.parliamentaryRecords).record;

  logger.debug('Constituency resolved', {
    lat,
    lon,
    constituency: feature.name,
    recordTier: boundary.tier,
    region: regionName,
  });

  return { boundaryMatch: boundary.record, regionMatch };
};

/**
 * Cached entry point. A point outside every boundary is cached like any
 * other result; a thrown data error is not.
 */
export const lookupRepresentatives = (
  { lat, lon }: { lat: number; lon: number },
  { store, cache, keyPrecision = config.cache.keyPrecision }: LookupContext
): RepresentativeLookup =>
  cache.getOrCompute(coordinateKey(lat, lon, keyPrecision), () => resolvePoint({ lat, lon }, store));

/** Names of every loaded boundary, sorted. */
export const listKnownBoundaries = (store: DataStore): string[] =>
  store.boundaries.map(feature => feature.name).sort();

/** Names of every parliamentary constituency with a record, sorted. */
export const listKnownRegions = (store: DataStore): string[] =>
  [...store.parliamentaryRecords.keys()].sort();

/** Case-insensitive exact name match; first in dataset order wins. */
export const findBoundaryFeature = (store: DataStore, name: string): BoundaryFeature | null => {
  const target = name.toLowerCase();
  return store.boundaries.find(feature => feature.name.toLowerCase() === target) ?? null;
};

export const getBoundaryGeometry = (store: DataStore, name: string): Geometry | null =>
  findBoundaryFeature(store, name)?.geometry ?? null;
