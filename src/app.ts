/**
 * Express application for the representative lookup API.
 *
 * Built from an explicitly constructed data store and query cache so that
 * server.ts and the tests can each supply their own.
 */

import express, { NextFunction, Request, Response } from 'express';
import compression from 'compression';
import * as Joi from 'joi';
import { config } from './config';
import type { DataStore } from './lib/data-store';
import type { BatchItemResult, LookupResponse, RepresentativeLookup } from './types';
import { AppError, NotFoundError, ValidationError } from './utils/errors';
import type { TTLCache } from './utils/TTLCache';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { corsMiddleware, helmetMiddleware, rateLimitMiddleware } from './middleware/security';
import {
  findBoundaryFeature,
  listKnownBoundaries,
  listKnownRegions,
  lookupRepresentatives,
} from './functions/lookupRepresentatives';

export interface AppContext {
  store: DataStore;
  cache: TTLCache<RepresentativeLookup>;
}

interface Coordinate {
  lat: number;
  lon: number;
}

const { minLat, maxLat, minLon, maxLon } = config.lookup;

const coordinateSchema = Joi.object<Coordinate>({
  lat: Joi.number().min(minLat).max(maxLat).required(),
  lon: Joi.number().min(minLon).max(maxLon).required(),
}).unknown();

const batchSchema = Joi.object<{ coordinates: unknown[] }>({
  coordinates: Joi.array().max(config.api.maxBatchSize).required(),
});

function parseCoordinate(input: unknown): Coordinate {
  const result = coordinateSchema.validate(input);
  if (result.error) {
    throw new ValidationError(result.error.message);
  }
  return result.value;
}

export function createApp({ store, cache }: AppContext): express.Express {
  const app = express();

  app.use(compression({ threshold: 1024 }));
  app.use(helmetMiddleware);
  app.use(corsMiddleware);
  app.use(rateLimitMiddleware);
  app.use(express.json());

  app.get('/', (_req: Request, res: Response) => {
    res.json({ status: 'ok', message: 'Representative lookup API is running.' });
  });

  app.get('/health', (_req: Request, res: Response) => {
    const memUsage = process.memoryUsage();
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
      data: {
        boundaries: store.boundaries.length,
        assemblyRecords: store.assemblyRecords.size,
        parliamentaryRecords: store.parliamentaryRecords.size,
      },
      cache: {
        entries: cache.size(),
      },
      memory: {
        heapUsed: Math.round(memUsage.heapUsed / 1024 / 1024),
        rss: Math.round(memUsage.rss / 1024 / 1024),
      },
    });
  });

  app.get('/api/v1/lookup', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { lat, lon } = parseCoordinate({ lat: req.query.lat, lon: req.query.lon });
      const result = lookupRepresentatives({ lat, lon }, { store, cache });

      if (!result.boundaryMatch) {
        throw new NotFoundError(
          `No representatives found for coordinates (${lat}, ${lon}). ` +
            'Ensure the point falls within the covered constituencies.'
        );
      }

      const body: LookupResponse = { latitude: lat, longitude: lon, ...result };
      res.json(body);
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/v1/lookup/batch', (req: Request, res: Response, next: NextFunction) => {
    try {
      const batch = batchSchema.validate(req.body);
      if (batch.error) {
        throw new ValidationError(batch.error.message);
      }

      const results = batch.value.coordinates.map((input, index): BatchItemResult => {
        let coordinate: Coordinate;
        try {
          coordinate = parseCoordinate(input);
        } catch (error) {
          if (!(error instanceof ValidationError)) throw error;
          return { index, status: 'invalid', error: error.message, code: error.code };
        }

        const { lat, lon } = coordinate;
        try {
          const result = lookupRepresentatives({ lat, lon }, { store, cache });
          return {
            index,
            status: result.boundaryMatch ? 'found' : 'not_found',
            latitude: lat,
            longitude: lon,
            ...result,
          };
        } catch (error) {
          if (!(error instanceof AppError)) throw error;
          return { index, status: 'error', latitude: lat, longitude: lon, error: 'Boundary data error', code: error.code };
        }
      });

      res.json({ count: results.length, results });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/v1/constituencies', (_req: Request, res: Response) => {
    res.json({
      assemblyConstituencies: listKnownBoundaries(store),
      parliamentaryConstituencies: listKnownRegions(store),
    });
  });

  app.get('/api/v1/constituencies/geojson/:name', (req: Request, res: Response, next: NextFunction) => {
    const feature = findBoundaryFeature(store, req.params.name);
    if (!feature) {
      next(new NotFoundError(`Assembly constituency '${req.params.name}' not found.`));
      return;
    }

    res.json({
      type: 'FeatureCollection',
      features: [{ type: 'Feature', properties: feature.properties, geometry: feature.geometry }],
    });
  });

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
