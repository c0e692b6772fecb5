import path from 'path';
import dotenv from 'dotenv';

const environment = (process.env.NODE_ENV || 'development').trim();
const envFile = environment === 'production' ? '.env.prod' : '.env.dev';
const configResult = dotenv.config({ path: envFile });

export const loadedEnvFile: string | null = configResult.error ? null : envFile;

export type SubcategoryPolicy = 'strict' | 'free';

export type AppConfig = {
  environment: string;
  port: number;
  host: string;
  dbStorage: string;
  dbLogging: boolean;
  catalogPath: string;
  subcategoryPolicy: SubcategoryPolicy;
  corsOrigins: string[];
  rateLimitMax: number;
};

const DEFAULT_CATALOG_PATH = path.resolve(__dirname, '../../data/categories.json');

const parsePositiveInt = (name: string, raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return parsed;
};

const parseBoolean = (name: string, raw: string | undefined): boolean => {
  const value = (raw ?? '').trim().toLowerCase();
  if (value === '' || value === 'false') {
    return false;
  }
  if (value === 'true') {
    return true;
  }
  throw new Error(`${name} must be "true" or "false", got "${raw}"`);
};

export const parseSubcategoryPolicy = (raw: string | undefined): SubcategoryPolicy => {
  const value = (raw ?? 'strict').trim().toLowerCase();
  if (value === 'strict' || value === 'free') {
    return value;
  }
  throw new Error(`SUBCATEGORY_POLICY must be "strict" or "free", got "${raw}"`);
};

export function readConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const catalogPath = env.CATEGORY_CATALOG_PATH?.trim();
  return {
    environment: (env.NODE_ENV || 'development').trim(),
    port: parsePositiveInt('PORT', env.PORT, 3001),
    host: env.HOST?.trim() || '127.0.0.1',
    dbStorage: env.DB_STORAGE?.trim() || 'ledger.sqlite',
    dbLogging: parseBoolean('DB_LOGGING', env.DB_LOGGING),
    catalogPath: catalogPath ? path.resolve(catalogPath) : DEFAULT_CATALOG_PATH,
    subcategoryPolicy: parseSubcategoryPolicy(env.SUBCATEGORY_POLICY),
    corsOrigins: (env.CORS_ORIGINS ?? '')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    rateLimitMax: parsePositiveInt('RATE_LIMIT_MAX', env.RATE_LIMIT_MAX, 1000),
  };
}
