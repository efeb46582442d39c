/**
 * Configuration management
 * All behavior is driven by environment variables
 */

export interface Config {
  // Database
  databaseUrl: string;
  databaseSsl: boolean;

  // Catalog API
  catalogApi: {
    baseUrl: string;
    login: string;
    password: string;
    clientId: string;
    clientSecret: string;
    requestTimeoutMs: number;
  };

  // Listing query
  catalogueIds: number[];
  townId: number;
  period: number;
  pageSize: number;
  pageCount: number;
  fetchConcurrency: number;

  // Normalization
  sourceSystemId: number;
  timeZone: string | undefined;

  // Reconciliation
  similarityThreshold: number;
}

export const DEFAULT_CATALOGUE_IDS: readonly number[] = [
  1, 11, 33,
  62, 76, 86,
  100, 136, 151,
  175, 182, 197,
  205, 222, 234,
  260, 270, 284,
  306, 327, 362,
  381, 414, 426,
  438, 471, 478,
  505, 512, 548,
];

type Env = Record<string, string | undefined>;

function parseStringArray(value: string | undefined, defaultValue: string[] = []): string[] {
  if (!value) return defaultValue;
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

function parseNumberArray(value: string | undefined, defaultValue: readonly number[]): number[] {
  const items = parseStringArray(value);
  if (items.length === 0) return [...defaultValue];
  return items.map(item => {
    const parsed = parseInt(item, 10);
    if (isNaN(parsed)) {
      throw new Error(`Invalid numeric list item: ${item}`);
    }
    return parsed;
  });
}

function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseTimeZone(value: string | undefined): string | undefined {
  if (!value) return undefined;
  try {
    new Intl.DateTimeFormat('en-CA', { timeZone: value });
  } catch (error) {
    throw new Error(`Invalid TIMEZONE: ${value}`, { cause: error });
  }
  return value;
}

function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

/**
 * Database settings only, for scripts that never call the catalog API
 */
export function loadDatabaseConfig(env: Env = process.env): Pick<Config, 'databaseUrl' | 'databaseSsl'> {
  return {
    databaseUrl: requireEnv(env, 'DATABASE_URL'),
    databaseSsl: parseBoolean(env.DATABASE_SSL, false),
  };
}

export function loadConfig(env: Env = process.env): Config {
  const requiredEnvVars = [
    'DATABASE_URL',
    'CATALOG_API_LOGIN',
    'CATALOG_API_PASSWORD',
    'CATALOG_API_CLIENT_ID',
    'CATALOG_API_CLIENT_SECRET',
  ];

  for (const envVar of requiredEnvVars) {
    requireEnv(env, envVar);
  }

  const similarityThreshold = parseNumber(env.SIMILARITY_THRESHOLD, 75);
  if (similarityThreshold < 0 || similarityThreshold > 100) {
    throw new Error(`SIMILARITY_THRESHOLD must be between 0 and 100, got ${similarityThreshold}`);
  }

  return {
    ...loadDatabaseConfig(env),
    catalogApi: {
      baseUrl: (env.CATALOG_API_BASE_URL || 'https://api.superjob.ru/2.20').replace(/\/+$/, ''),
      login: requireEnv(env, 'CATALOG_API_LOGIN'),
      password: requireEnv(env, 'CATALOG_API_PASSWORD'),
      clientId: requireEnv(env, 'CATALOG_API_CLIENT_ID'),
      clientSecret: requireEnv(env, 'CATALOG_API_CLIENT_SECRET'),
      requestTimeoutMs: parseNumber(env.REQUEST_TIMEOUT_MS, 30000),
    },
    catalogueIds: parseNumberArray(env.CATALOG_IDS, DEFAULT_CATALOGUE_IDS),
    townId: parseNumber(env.CATALOG_TOWN_ID, 13),
    period: parseNumber(env.CATALOG_PERIOD, 0),
    pageSize: parseNumber(env.CATALOG_PAGE_SIZE, 100),
    pageCount: Math.max(1, parseNumber(env.CATALOG_PAGE_COUNT, 5)),
    fetchConcurrency: Math.max(1, parseNumber(env.FETCH_CONCURRENCY, 4)),
    sourceSystemId: parseNumber(env.SOURCE_SYSTEM_ID, 23),
    timeZone: parseTimeZone(env.TIMEZONE),
    similarityThreshold,
  };
}
