import type { Position } from 'geojson';
import type { BoundaryFeature } from '../types';
import {
  createDataStore,
  parseBoundaryCollection,
  parseRegionGroups,
  parseRepresentativeTable,
  type DataStore,
} from '../lib/data-store';

export const NAME_KEYS = ['AC_NAME', 'AC_Name', 'ac_name', 'NAME', 'name'];
export const CODE_KEYS = ['AC_NO', 'AC_Code', 'ac_no'];

export const square = (x0: number, y0: number, x1: number, y1: number): Position[] => [
  [x0, y0],
  [x1, y0],
  [x1, y1],
  [x0, y1],
  [x0, y0],
];

export interface FixtureFeature {
  name: string;
  code?: string | number;
  geometry: unknown;
}

export function featureCollection(features: FixtureFeature[]): unknown {
  return {
    type: 'FeatureCollection',
    features: features.map(({ name, code, geometry }) => ({
      type: 'Feature',
      properties: code === undefined ? { AC_NAME: name } : { AC_NAME: name, AC_NO: code },
      geometry,
    })),
  };
}

export function boundaries(features: FixtureFeature[]): BoundaryFeature[] {
  return parseBoundaryCollection(featureCollection(features), {
    nameKeys: NAME_KEYS,
    codeKeys: CODE_KEYS,
  });
}

export const polygon = (...rings: Position[][]) => ({ type: 'Polygon', coordinates: rings });

/**
 * One assembly constituency, Shivajinagar, covering
 * lon 77.50–77.70 / lat 12.90–13.05, mapped to Bangalore Central.
 */
export function shivajinagarStore(): DataStore {
  return createDataStore({
    boundaries: boundaries([
      { name: 'Shivajinagar', code: 162, geometry: polygon(square(77.5, 12.9, 77.7, 13.05)) },
    ]),
    assemblyRecords: parseRepresentativeTable({
      Shivajinagar: { name: 'Test Member A', party: 'Party One', constituency_number: '162' },
    }),
    parliamentaryRecords: parseRepresentativeTable({
      'Bangalore Central': { name: 'Test Member B', party: 'Party Two', constituency_number: 25 },
    }),
    regions: parseRegionGroups({ 'Bangalore Central': ['Shivajinagar'] }),
  });
}

/**
 * Four non-overlapping constituencies exercising each resolution path:
 * - Shivajinagar: exact record, mapped region
 * - Anekal (SC): record stored without the reservation suffix
 * - Hosakote: no assembly record at all
 * - Whitefield: missing from the region table
 */
export function sampleStore(): DataStore {
  return createDataStore({
    boundaries: boundaries([
      { name: 'Shivajinagar', code: 162, geometry: polygon(square(77.5, 12.9, 77.7, 13.05)) },
      { name: 'Anekal (SC)', code: 177, geometry: polygon(square(77.65, 12.71, 77.75, 12.78)) },
      { name: 'Hosakote', code: 178, geometry: polygon(square(77.75, 13.06, 77.85, 13.15)) },
      { name: 'Whitefield', geometry: polygon(square(77.72, 12.9, 77.8, 13.0)) },
    ]),
    assemblyRecords: parseRepresentativeTable({
      Shivajinagar: { name: 'Test Member A', party: 'Party One', constituency_number: '162' },
      Anekal: { name: 'Test Member C', party: 'Party Two' },
      Whitefield: { name: 'Test Member D', party: 'Party One' },
    }),
    parliamentaryRecords: parseRepresentativeTable({
      'Bangalore Central': { name: 'Test Member B', party: 'Party Two', constituency_number: 25 },
      'Bangalore Rural': { name: 'Test Member E', party: 'Party One', constituency_number: '23' },
    }),
    regions: parseRegionGroups({
      'Bangalore Central': ['Shivajinagar'],
      'Bangalore Rural': ['Anekal (SC)', 'Hosakote'],
    }),
  });
}
