import type { BBox, Geometry, MultiPolygon, Polygon, Position } from 'geojson';

export type { BBox, Geometry, Position };

export type BoundaryGeometry = Polygon | MultiPolygon;

// An assembly constituency boundary as loaded from the GeoJSON dataset
export interface BoundaryFeature {
  readonly name: string;
  // Constituency number from the property bag, when the source carries one
  readonly code: string | null;
  readonly properties: Readonly<Record<string, unknown>>;
  // Not validated at load time: the locator checks it on every scan
  readonly geometry: Geometry | null;
  // Only set for well-formed geometries
  readonly bbox: BBox | null;
}

export interface RepresentativeRecord {
  name: string;
  party: string;
  constituency: string;
  constituencyNumber: string | null;
  contact: string | null;
  email: string | null;
  officeAddress: string | null;
}

export type MatchTier = 'exact' | 'normalized' | 'case-insensitive' | 'placeholder';

export interface RepresentativeMatch {
  record: RepresentativeRecord;
  tier: MatchTier;
}

// Result of resolving one coordinate
export interface RepresentativeLookup {
  // null iff the point lies outside every known boundary
  boundaryMatch: RepresentativeRecord | null;
  regionMatch: RepresentativeRecord | null;
}

export interface LookupResponse extends RepresentativeLookup {
  latitude: number;
  longitude: number;
}

export type BatchItemStatus = 'found' | 'not_found' | 'invalid' | 'error';

export interface BatchItemResult {
  index: number;
  status: BatchItemStatus;
  latitude?: number;
  longitude?: number;
  boundaryMatch?: RepresentativeRecord | null;
  regionMatch?: RepresentativeRecord | null;
  error?: string;
  code?: string;
}

// CLI types
export interface LookupOptions {
  lat: string;
  lon: string;
  host: string;
}

export interface BatchOptions {
  file: string;
  host: string;
}

export interface HostOptions {
  host: string;
}
