import path from 'path';
import { config } from '../../config';
import {
  UNKNOWN_BOUNDARY,
  loadDataStore,
  parseBoundaryCollection,
  parseRegionGroups,
  parseRepresentativeTable,
} from '../../lib/data-store';
import { locateBoundary } from '../../functions/locateBoundary';
import { DataIntegrityError } from '../../utils/errors';
import { CODE_KEYS, NAME_KEYS, polygon, square } from '../fixtures';

const options = { nameKeys: NAME_KEYS, codeKeys: CODE_KEYS };

describe('parseBoundaryCollection', () => {
  test('should read name, code, properties and bbox', () => {
    const [feature] = parseBoundaryCollection(
      {
        type: 'FeatureCollection',
        features: [
          {
            type: 'Feature',
            properties: { AC_NAME: ' Shivajinagar ', AC_NO: 162, DIST: 'Bangalore' },
            geometry: polygon(square(77.5, 12.9, 77.7, 13.05)),
          },
        ],
      },
      options
    );

    expect(feature.name).toBe('Shivajinagar');
    expect(feature.code).toBe('162');
    expect(feature.properties).toEqual({ AC_NAME: ' Shivajinagar ', AC_NO: 162, DIST: 'Bangalore' });
    expect(feature.bbox).toEqual([77.5, 12.9, 77.7, 13.05]);
    expect(Object.isFrozen(feature)).toBe(true);
  });

  test('should try the name keys in order', () => {
    const features = parseBoundaryCollection(
      {
        type: 'FeatureCollection',
        features: [
          { type: 'Feature', properties: { AC_NAME: '', name: 'Fallback' }, geometry: null },
          { type: 'Feature', properties: { ac_name: 'Lower', NAME: 'Upper' }, geometry: null },
          { type: 'Feature', properties: { DIST: 'Bangalore' }, geometry: null },
        ],
      },
      options
    );

    expect(features.map(feature => feature.name)).toEqual(['Fallback', 'Lower', UNKNOWN_BOUNDARY]);
    expect(features.map(feature => feature.code)).toEqual([null, null, null]);
  });

  test('should keep unusable geometry but leave its bbox unset', () => {
    const features = parseBoundaryCollection(
      {
        type: 'FeatureCollection',
        features: [
          { type: 'Feature', properties: { AC_NAME: 'Line' }, geometry: { type: 'LineString', coordinates: [[0, 0], [1, 1]] } },
          { type: 'Feature', properties: { AC_NAME: 'Broken' }, geometry: { type: 'Polygon' } },
          { type: 'Feature', properties: null },
        ],
      },
      options
    );

    expect(features.map(feature => feature.bbox)).toEqual([null, null, null]);
    expect(features[0].geometry).toEqual({ type: 'LineString', coordinates: [[0, 0], [1, 1]] });
    expect(features[2].geometry).toBeNull();
    expect(features[2].properties).toEqual({});
    expect(features[2].name).toBe(UNKNOWN_BOUNDARY);
  });

  test('should reject anything that is not a FeatureCollection', () => {
    const parse = () => parseBoundaryCollection({ type: 'Feature', features: [] }, options);

    expect(parse).toThrow(DataIntegrityError);
    expect(parse).toThrow(/^Invalid boundary FeatureCollection: /);
  });

  test('should load geometry without a type tag and leave it to the locator', () => {
    const features = parseBoundaryCollection(
      {
        type: 'FeatureCollection',
        features: [
          { type: 'Feature', properties: { AC_NAME: 'Untagged' }, geometry: { coordinates: [] } },
          { type: 'Feature', properties: { AC_NAME: 'Text' }, geometry: 'oops' },
          { type: 'Feature', properties: { AC_NAME: 'Good' }, geometry: polygon(square(0, 0, 4, 4)) },
        ],
      },
      options
    );

    expect(features.map(feature => feature.geometry === null)).toEqual([true, true, false]);

    const inside = locateBoundary([2, 2], features);
    expect(inside.feature?.name).toBe('Good');
    expect(inside.anomalies).toEqual([
      { index: 0, feature: 'Untagged', kind: 'malformed-feature', message: 'geometry is missing or has no type tag' },
      { index: 1, feature: 'Text', kind: 'malformed-feature', message: 'geometry is missing or has no type tag' },
    ]);

    const outside = locateBoundary([9, 9], features);
    expect(outside.feature).toBeNull();
    expect(outside.anomalies).toHaveLength(2);
  });

  test('should freeze geometry and properties all the way down', () => {
    const [feature] = parseBoundaryCollection(
      {
        type: 'FeatureCollection',
        features: [
          {
            type: 'Feature',
            properties: { AC_NAME: 'Shivajinagar', tags: ['urban'] },
            geometry: polygon(square(77.5, 12.9, 77.7, 13.05)),
          },
        ],
      },
      options
    );

    const { geometry } = feature;
    if (geometry?.type !== 'Polygon') throw new Error('expected a Polygon');

    expect(Object.isFrozen(geometry)).toBe(true);
    expect(Object.isFrozen(geometry.coordinates[0][0])).toBe(true);
    expect(() => {
      geometry.coordinates[0][0][0] = 0;
    }).toThrow(TypeError);
    expect(geometry.coordinates[0][0]).toEqual([77.5, 12.9]);
    expect(Object.isFrozen(feature.properties.tags)).toBe(true);
  });
});

describe('parseRepresentativeTable', () => {
  test('should map a table onto representative records', () => {
    const records = parseRepresentativeTable({
      Shivajinagar: {
        name: ' Test Member A ',
        party: 'Party One',
        constituency_number: 162,
        contact: '',
        email: 'member-a@example.test',
        office_address: 'Test Address 1',
      },
      Anekal: { name: 'Test Member C', constituency: 'Anekal (SC)' },
    });

    expect(records.get('Shivajinagar')).toEqual({
      name: 'Test Member A',
      party: 'Party One',
      constituency: 'Shivajinagar',
      constituencyNumber: '162',
      contact: null,
      email: 'member-a@example.test',
      officeAddress: 'Test Address 1',
    });
    expect(records.get('Anekal')).toEqual({
      name: 'Test Member C',
      party: 'N/A',
      constituency: 'Anekal (SC)',
      constituencyNumber: null,
      contact: null,
      email: null,
      officeAddress: null,
    });
  });

  test('should reject a record without a name', () => {
    const parse = () => parseRepresentativeTable({ Hebbal: { party: 'Party One' } }, 'assembly table');

    expect(parse).toThrow(DataIntegrityError);
    expect(parse).toThrow(/^Invalid assembly table: /);
  });
});

describe('parseRegionGroups', () => {
  test('should build a region table', () => {
    const table = parseRegionGroups({ 'Bangalore Rural': ['Hosakote', ' Anekal (SC) '] });

    expect(table.regionFor('Anekal (SC)')).toBe('Bangalore Rural');
    expect(table.size).toBe(2);
  });

  test('should reject groups that are not arrays', () => {
    expect(() => parseRegionGroups({ 'Bangalore Rural': 'Hosakote' })).toThrow(DataIntegrityError);
  });
});

describe('loadDataStore', () => {
  test('should load the bundled datasets', async () => {
    const result = await loadDataStore();

    expect(result.status).toBe('success');
    if (result.status !== 'success') return;

    const { store } = result;
    expect(store.boundaries).toHaveLength(8);
    expect(store.assemblyRecords.size).toBe(8);
    expect(store.parliamentaryRecords.size).toBe(4);
    expect(store.regions.size).toBe(36);
    expect(store.boundaries.every(feature => feature.bbox !== null)).toBe(true);
    expect(Object.isFrozen(store.boundaries)).toBe(true);
    expect(result.message).toBe('Loaded 8 boundaries into memory');
  });

  test('should report a missing file instead of throwing', async () => {
    const result = await loadDataStore({
      ...config.data,
      boundaryFile: path.join(__dirname, 'does-not-exist.geojson'),
    });

    expect(result.status).toBe('error');
    if (result.status !== 'error') return;
    expect(result.error).toContain('ENOENT');
  });
});
