#!/usr/bin/env node

import fs from 'fs/promises';
import { Command } from 'commander';
import fetch from 'node-fetch';
import * as Joi from 'joi';
import { config } from './config';
import type { BatchOptions, HostOptions, LookupOptions } from './types';

interface HttpResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type HttpFetch = (
  url: string,
  init?: { method?: string; headers?: Record<string, string>; body?: string }
) => Promise<HttpResponse>;

interface RecordSummary {
  name: string;
  party: string;
  constituency: string;
}

interface LookupSummary {
  boundaryMatch: RecordSummary | null;
  regionMatch: RecordSummary | null;
}

interface BatchSummary {
  count: number;
  results: Array<LookupSummary & { index: number; status: string; error?: string }>;
}

const recordSummarySchema = Joi.object<RecordSummary>({
  name: Joi.string().required(),
  party: Joi.string().required(),
  constituency: Joi.string().required(),
})
  .unknown()
  .allow(null);

const lookupSummarySchema = Joi.object<LookupSummary>({
  boundaryMatch: recordSummarySchema.required(),
  regionMatch: recordSummarySchema.required(),
}).unknown();

const batchSummarySchema = Joi.object<BatchSummary>({
  count: Joi.number().required(),
  results: Joi.array()
    .items(
      Joi.object({
        index: Joi.number().required(),
        status: Joi.string().required(),
        error: Joi.string(),
        boundaryMatch: recordSummarySchema.default(null),
        regionMatch: recordSummarySchema.default(null),
      }).unknown()
    )
    .required(),
}).unknown();

const errorBodySchema = Joi.object<{ message: string }>({
  message: Joi.string().required(),
}).unknown();

function describeRecord(label: string, record: RecordSummary | null): string {
  if (!record) return `${label}: -`;
  return `${label}: ${record.name} (${record.party}), ${record.constituency}`;
}

function errorMessage(body: unknown, status: number): string {
  const parsed = errorBodySchema.validate(body);
  return parsed.error ? `HTTP ${status}` : parsed.value.message;
}

export function buildProgram(httpFetch: HttpFetch = fetch): Command {
  const program = new Command();
  const defaultHost = `http://localhost:${config.port}`;

  program
    .name('representative-lookup')
    .description('CLI for the representative lookup API')
    .version('1.0.0');

  program
    .command('lookup')
    .description('Look up the representatives for a coordinate')
    .requiredOption('--lat <number>', 'Latitude')
    .requiredOption('--lon <number>', 'Longitude')
    .option('--host <string>', 'API host', defaultHost)
    .action(async (options: LookupOptions) => {
      const lat = Number(options.lat);
      const lon = Number(options.lon);
      if (Number.isNaN(lat) || Number.isNaN(lon)) {
        console.error('Error: --lat and --lon must be valid numbers');
        process.exitCode = 1;
        return;
      }

      try {
        const response = await httpFetch(`${options.host}/api/v1/lookup?lat=${lat}&lon=${lon}`);
        const body = await response.json();
        if (!response.ok) {
          console.log(`✗ ${errorMessage(body, response.status)}`);
          process.exitCode = 1;
          return;
        }

        const parsed = lookupSummarySchema.validate(body);
        if (parsed.error) {
          console.error(`Error: unexpected response: ${parsed.error.message}`);
          process.exitCode = 1;
          return;
        }
        console.log(describeRecord('MLA', parsed.value.boundaryMatch));
        console.log(describeRecord('MP', parsed.value.regionMatch));
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exitCode = 1;
      }
    });

  program
    .command('batch')
    .description('Look up a JSON file holding an array of { lat, lon } objects')
    .requiredOption('-f, --file <path>', 'Path to the JSON file')
    .option('--host <string>', 'API host', defaultHost)
    .action(async (options: BatchOptions) => {
      try {
        const coordinates: unknown = JSON.parse(await fs.readFile(options.file, 'utf-8'));
        if (!Array.isArray(coordinates)) {
          console.error('Error: file must contain a JSON array, e.g. [{"lat": 12.97, "lon": 77.59}]');
          process.exitCode = 1;
          return;
        }

        const response = await httpFetch(`${options.host}/api/v1/lookup/batch`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ coordinates }),
        });
        const body = await response.json();
        if (!response.ok) {
          console.error(`Error: ${errorMessage(body, response.status)}`);
          process.exitCode = 1;
          return;
        }

        const parsed = batchSummarySchema.validate(body);
        if (parsed.error) {
          console.error(`Error: unexpected response: ${parsed.error.message}`);
          process.exitCode = 1;
          return;
        }

        for (const result of parsed.value.results) {
          if (result.status === 'found' && result.boundaryMatch) {
            console.log(`  [${result.index}] ✓ ${result.boundaryMatch.constituency}`);
          } else {
            console.log(`  [${result.index}] ✗ ${result.error ?? result.status}`);
          }
        }
        const found = parsed.value.results.filter(result => result.status === 'found').length;
        console.log(`Summary: ${found}/${parsed.value.count} found`);
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exitCode = 1;
      }
    });

  program
    .command('boundaries')
    .description('List the assembly constituencies the API knows about')
    .option('--host <string>', 'API host', defaultHost)
    .action(async (options: HostOptions) => {
      try {
        const response = await httpFetch(`${options.host}/api/v1/constituencies`);
        const parsed = Joi.object<{ assemblyConstituencies: string[] }>({
          assemblyConstituencies: Joi.array().items(Joi.string()).required(),
        })
          .unknown()
          .validate(await response.json());
        if (parsed.error) {
          console.error(`Error: unexpected response: ${parsed.error.message}`);
          process.exitCode = 1;
          return;
        }
        parsed.value.assemblyConstituencies.forEach(name => console.log(name));
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exitCode = 1;
      }
    });

  program
    .command('health')
    .description('Check if the API is running')
    .option('--host <string>', 'API host', defaultHost)
    .action(async (options: HostOptions) => {
      try {
        const response = await httpFetch(`${options.host}/health`);
        if (response.ok) {
          console.log('✓ API is healthy and running');
        } else {
          console.log(`✗ API health check failed (HTTP ${response.status})`);
          process.exitCode = 1;
        }
      } catch (error) {
        console.log('✗ Could not connect to API');
        console.error('Error:', error instanceof Error ? error.message : error);
        process.exitCode = 1;
      }
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}
