import * as dotenv from 'dotenv';
import * as Joi from 'joi';
import path from 'path';

// Load environment variables silently
dotenv.config({ debug: false });

interface EnvVars {
  PORT: number;
  NODE_ENV: 'development' | 'production' | 'test';
  ENABLE_SECURITY_MIDDLEWARE: boolean;
  BYPASS_IPS: string;
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX_REQUESTS: number;
  CORS_ALLOWED_ORIGINS: string;
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'debug';
  LOG_DIR: string;
  DATA_DIR: string;
  BOUNDARY_FILE: string;
  ASSEMBLY_RECORDS_FILE: string;
  PARLIAMENTARY_RECORDS_FILE: string;
  REGION_TABLE_FILE: string;
  BOUNDARY_NAME_KEYS: string;
  BOUNDARY_CODE_KEYS: string;
  QUERY_CACHE_TTL_SECONDS: number;
  QUERY_CACHE_MAX_ENTRIES: number;
  CACHE_KEY_PRECISION: number;
  LOOKUP_MIN_LAT: number;
  LOOKUP_MAX_LAT: number;
  LOOKUP_MIN_LON: number;
  LOOKUP_MAX_LON: number;
  MAX_BATCH_SIZE: number;
}

const envSchema = Joi.object<EnvVars>({
  // Server
  PORT: Joi.number().port().default(8000),
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),

  // Security
  ENABLE_SECURITY_MIDDLEWARE: Joi.boolean().default(false),
  BYPASS_IPS: Joi.string().default('127.0.0.1,::1,localhost'),
  RATE_LIMIT_WINDOW_MS: Joi.number().default(60000),
  RATE_LIMIT_MAX_REQUESTS: Joi.number().default(100),
  CORS_ALLOWED_ORIGINS: Joi.string().default('*'),

  // Logging
  LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'debug').default('info'),
  LOG_DIR: Joi.string().default('logs'),

  // Datasets
  DATA_DIR: Joi.string().default(path.join(__dirname, '../../data')),
  BOUNDARY_FILE: Joi.string().default('assembly_constituencies.geojson'),
  ASSEMBLY_RECORDS_FILE: Joi.string().default('assembly_representatives.json'),
  PARLIAMENTARY_RECORDS_FILE: Joi.string().default('parliamentary_representatives.json'),
  REGION_TABLE_FILE: Joi.string().default('region_table.json'),
  BOUNDARY_NAME_KEYS: Joi.string().default('AC_NAME,AC_Name,ac_name,NAME,name'),
  BOUNDARY_CODE_KEYS: Joi.string().default('AC_NO,AC_Code,ac_no'),

  // Query cache
  QUERY_CACHE_TTL_SECONDS: Joi.number().min(0).default(300),
  QUERY_CACHE_MAX_ENTRIES: Joi.number().integer().min(0).default(0),
  CACHE_KEY_PRECISION: Joi.number().integer().min(0).max(12).default(6),

  // Accepted lookup area
  LOOKUP_MIN_LAT: Joi.number().min(-90).max(90).default(12.7),
  LOOKUP_MAX_LAT: Joi.number().min(-90).max(90).default(13.2),
  LOOKUP_MIN_LON: Joi.number().min(-180).max(180).default(77.3),
  LOOKUP_MAX_LON: Joi.number().min(-180).max(180).default(77.9),

  // API Limits
  MAX_BATCH_SIZE: Joi.number().integer().min(1).max(500).default(50),
}).unknown();

const validation = envSchema.validate(process.env);

if (validation.error) {
  throw new Error(`Config validation error: ${validation.error.message}`);
}

const envVars: EnvVars = validation.value;

const splitList = (value: string): string[] =>
  value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);

export const config = {
  port: envVars.PORT,
  nodeEnv: envVars.NODE_ENV,
  isProduction: envVars.NODE_ENV === 'production',
  isDevelopment: envVars.NODE_ENV === 'development',
  isTest: envVars.NODE_ENV === 'test',

  security: {
    enableMiddleware: envVars.ENABLE_SECURITY_MIDDLEWARE,
    bypassIPs: splitList(envVars.BYPASS_IPS),
  },

  rateLimit: {
    windowMs: envVars.RATE_LIMIT_WINDOW_MS,
    maxRequests: envVars.RATE_LIMIT_MAX_REQUESTS,
  },

  cors: {
    allowedOrigins: splitList(envVars.CORS_ALLOWED_ORIGINS),
  },

  logging: {
    level: envVars.LOG_LEVEL,
    dir: envVars.LOG_DIR,
  },

  data: {
    boundaryFile: path.resolve(envVars.DATA_DIR, envVars.BOUNDARY_FILE),
    assemblyRecordsFile: path.resolve(envVars.DATA_DIR, envVars.ASSEMBLY_RECORDS_FILE),
    parliamentaryRecordsFile: path.resolve(envVars.DATA_DIR, envVars.PARLIAMENTARY_RECORDS_FILE),
    regionTableFile: path.resolve(envVars.DATA_DIR, envVars.REGION_TABLE_FILE),
    nameKeys: splitList(envVars.BOUNDARY_NAME_KEYS),
    codeKeys: splitList(envVars.BOUNDARY_CODE_KEYS),
  },

  cache: {
    ttlMs: envVars.QUERY_CACHE_TTL_SECONDS * 1000,
    maxEntries: envVars.QUERY_CACHE_MAX_ENTRIES,
    keyPrecision: envVars.CACHE_KEY_PRECISION,
  },

  lookup: {
    minLat: envVars.LOOKUP_MIN_LAT,
    maxLat: envVars.LOOKUP_MAX_LAT,
    minLon: envVars.LOOKUP_MIN_LON,
    maxLon: envVars.LOOKUP_MAX_LON,
  },

  api: {
    maxBatchSize: envVars.MAX_BATCH_SIZE,
  },
};
