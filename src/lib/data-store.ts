/**
 * src/lib/data-store.ts
 *
 * Loads the constituency datasets into memory once at startup: the assembly
 * constituency boundaries (GeoJSON), the representative records for both
 * tiers and the assembly → parliamentary region table. Everything is frozen
 * after load; lookups only ever read it.
 *
 * Geometry is not validated here; the locator checks each feature at query
 * time and skips broken ones. A geometry that is not an object with a type tag
 * is stored as null. Geometry and properties are frozen all the way down.
 */

import fs from 'fs';
import * as Joi from 'joi';
import { bbox as computeBBox } from '@turf/turf';
import type { Geometry } from 'geojson';
import { config } from '../config';
import type { BoundaryFeature, RepresentativeRecord } from '../types';
import { logger } from '../utils/logger';
import { DataIntegrityError } from '../utils/errors';
import { isBoundaryGeometry } from '../utils/pointInPolygon';
import { NOT_APPLICABLE, type RepresentativeRecords } from '../functions/resolveRepresentative';
import { RegionTable, type RegionGroups } from './region-table';

export const UNKNOWN_BOUNDARY = 'Unknown';

export interface DataStore {
  readonly boundaries: readonly BoundaryFeature[];
  readonly assemblyRecords: RepresentativeRecords;
  readonly parliamentaryRecords: RepresentativeRecords;
  readonly regions: RegionTable;
}

export interface BoundaryParseOptions {
  // Property keys tried in order for the boundary name
  nameKeys: readonly string[];
  codeKeys: readonly string[];
}

export interface DataFiles {
  boundaryFile: string;
  assemblyRecordsFile: string;
  parliamentaryRecordsFile: string;
  regionTableFile: string;
  nameKeys: readonly string[];
  codeKeys: readonly string[];
}

export type LoadResult =
  | { status: 'success'; store: DataStore; message: string }
  | { status: 'error'; error: string };

// -------------------------
// Schemas
// -------------------------

interface RawFeature {
  properties: Record<string, unknown> | null;
  geometry: unknown;
}

interface RawFeatureCollection {
  type: 'FeatureCollection';
  features: RawFeature[];
}

interface RawRepresentative {
  name: string;
  party: string;
  constituency?: string;
  constituency_number?: string | number | null;
  contact?: string | null;
  email?: string | null;
  office_address?: string | null;
}

const featureCollectionSchema = Joi.object<RawFeatureCollection>({
  type: Joi.string().valid('FeatureCollection').required(),
  features: Joi.array()
    .items(
      Joi.object({
        properties: Joi.object().unknown().allow(null).default({}),
        geometry: Joi.any().default(null),
      }).unknown()
    )
    .required(),
}).unknown();

// Anything tagged with a string type is kept for the locator to check
const taggedGeometrySchema = Joi.object<Geometry>({ type: Joi.string().required() }).unknown();

const optionalText = Joi.string().trim().allow(null, '');

const representativeTableSchema = Joi.object<Record<string, RawRepresentative>>().pattern(
  Joi.string(),
  Joi.object({
    name: Joi.string().trim().min(1).required(),
    party: Joi.string().trim().default(NOT_APPLICABLE),
    constituency: Joi.string().trim().min(1),
    constituency_number: Joi.alternatives(Joi.string().trim(), Joi.number()).allow(null, ''),
    contact: optionalText,
    email: optionalText,
    office_address: optionalText,
  }).unknown()
);

const regionGroupsSchema = Joi.object<Record<string, string[]>>().pattern(
  Joi.string(),
  Joi.array().items(Joi.string().trim().min(1)).required()
);

function validate<T>(schema: Joi.ObjectSchema<T>, json: unknown, label: string): T {
  const result = schema.validate(json);
  if (result.error) {
    throw new DataIntegrityError(`Invalid ${label}: ${result.error.message}`);
  }
  return result.value;
}

// -------------------------
// Parsers
// -------------------------

function firstPropertyValue(
  properties: Readonly<Record<string, unknown>>,
  keys: readonly string[]
): string | null {
  for (const key of keys) {
    const value = properties[key];
    if (typeof value === 'string' && value.trim().length > 0) return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  }
  return null;
}

function taggedGeometry(value: unknown): Geometry | null {
  const result = taggedGeometrySchema.validate(value);
  return result.error || result.value === undefined ? null : result.value;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
}

const emptyToNull = (value: string | number | null | undefined): string | null =>
  value === undefined || value === null || value === '' ? null : String(value);

export function parseBoundaryCollection(
  json: unknown,
  { nameKeys, codeKeys }: BoundaryParseOptions
): BoundaryFeature[] {
  const collection = validate(featureCollectionSchema, json, 'boundary FeatureCollection');

  return collection.features.map((raw): BoundaryFeature => {
    const props = deepFreeze({ ...(raw.properties ?? {}) });
    const geometry = deepFreeze(taggedGeometry(raw.geometry));
    return Object.freeze({
      name: firstPropertyValue(props, nameKeys) ?? UNKNOWN_BOUNDARY,
      code: firstPropertyValue(props, codeKeys),
      properties: props,
      geometry,
      bbox: isBoundaryGeometry(geometry) ? computeBBox(geometry, { recompute: true }) : null,
    });
  });
}

export function parseRepresentativeTable(json: unknown, label = 'representative table'): Map<string, RepresentativeRecord> {
  const table = validate(representativeTableSchema, json, label);
  const records = new Map<string, RepresentativeRecord>();

  for (const [key, raw] of Object.entries(table)) {
    records.set(
      key,
      Object.freeze({
        name: raw.name,
        party: raw.party,
        constituency: raw.constituency ?? key,
        constituencyNumber: emptyToNull(raw.constituency_number),
        contact: emptyToNull(raw.contact),
        email: emptyToNull(raw.email),
        officeAddress: emptyToNull(raw.office_address),
      })
    );
  }
  return records;
}

export function parseRegionGroups(json: unknown): RegionTable {
  const groups: RegionGroups = validate(regionGroupsSchema, json, 'region table');
  return RegionTable.fromGroups(groups);
}

export function createDataStore(input: {
  boundaries: readonly BoundaryFeature[];
  assemblyRecords: RepresentativeRecords;
  parliamentaryRecords: RepresentativeRecords;
  regions: RegionTable;
}): DataStore {
  return Object.freeze({
    boundaries: Object.freeze([...input.boundaries]),
    assemblyRecords: input.assemblyRecords,
    parliamentaryRecords: input.parliamentaryRecords,
    regions: input.regions,
  });
}

// -------------------------
// Loading
// -------------------------

async function readJson(filePath: string): Promise<unknown> {
  const text = await fs.promises.readFile(filePath, 'utf-8');
  return JSON.parse(text);
}

/**
 * Reads and parses all four data files. Meant to be called exactly once at startup.
 */
export const loadDataStore = async (files: DataFiles = config.data): Promise<LoadResult> => {
  try {
    const [boundaryJson, assemblyJson, parliamentaryJson, regionJson] = await Promise.all([
      readJson(files.boundaryFile),
      readJson(files.assemblyRecordsFile),
      readJson(files.parliamentaryRecordsFile),
      readJson(files.regionTableFile),
    ]);

    const store = createDataStore({
      boundaries: parseBoundaryCollection(boundaryJson, files),
      assemblyRecords: parseRepresentativeTable(assemblyJson, 'assembly representative table'),
      parliamentaryRecords: parseRepresentativeTable(parliamentaryJson, 'parliamentary representative table'),
      regions: parseRegionGroups(regionJson),
    });

    const untestable = store.boundaries.filter(feature => feature.bbox === null).length;
    if (untestable > 0) {
      logger.warn('Some boundary features have unusable geometry and will never match', { untestable });
    }

    const memoryUsage = process.memoryUsage();
    logger.info('Loaded constituency datasets', {
      boundaries: store.boundaries.length,
      assemblyRecords: store.assemblyRecords.size,
      parliamentaryRecords: store.parliamentaryRecords.size,
      regionMappings: store.regions.size,
      heapUsedMb: Number((memoryUsage.heapUsed / 1024 / 1024).toFixed(2)),
    });

    return {
      status: 'success',
      store,
      message: `Loaded ${store.boundaries.length} boundaries into memory`,
    };
  } catch (err) {
    logger.error('Error loading constituency datasets', { error: err });
    return { status: 'error', error: err instanceof Error ? err.message : String(err) };
  }
};
