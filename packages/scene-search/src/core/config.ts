/**
 * Scene search configuration
 *
 * Loads configuration from .scene-searchrc (YAML) with environment variable
 * overrides and defaults, validated once with zod.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (SCENE_SEARCH_*)
 * 3. Config file (.scene-searchrc, --config path or SCENE_SEARCH_CONFIG)
 * 4. Default values
 *
 * Config files use snake_case keys:
 *
 * ```yaml
 * version: 1
 * catalog:
 *   kind: stac
 *   url: https://stac.example.org
 *   collections: [sentinel-1]
 * tiles:
 *   grid: ./grid/mgrs.geojson
 *   id_property: tile_id
 * retry:
 *   max_attempts: 300
 *   delay_ms: 1000
 * ```
 *
 * @module core/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ASF_SEARCH_URL } from '../catalog/asf-catalog.js';
import type { CatalogKind } from '../catalog/catalog.js';
import { DEFAULT_MAX_ATTEMPTS, DEFAULT_RETRY_DELAY_MS } from '../resilience/retry.js';
import { ConfigurationError } from './errors.js';
import { formatIssues } from '../query/scene-query.js';
import { parseLogLevel, type LogLevel } from './utils/logger.js';

export const ConfigSchema = z.object({
  version: z.literal(1),
  catalog: z.object({
    kind: z.enum(['stac', 'sqlite', 'asf']),
    /** STAC API root; required for kind `stac` */
    url: z.string().url().nullable(),
    collections: z.array(z.string().min(1)).min(1),
    /** SQLite index file for kind `sqlite` and for `index` */
    database: z.string().min(1),
    pageSize: z.number().int().positive(),
  }),
  reference: z.object({
    url: z.string().url(),
  }),
  tiles: z.object({
    grid: z.string().min(1).nullable(),
    idProperty: z.string().min(1),
  }),
  retry: z.object({
    maxAttempts: z.number().int().positive(),
    delayMs: z.number().int().nonnegative(),
  }),
  http: z.object({
    timeoutMs: z.number().int().positive(),
  }),
  search: z.object({
    concurrency: z.number().int().min(1).max(32),
    checkExist: z.boolean(),
  }),
  log: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    pretty: z.boolean(),
  }),
  /** Resolved config file path */
  configPath: z.string().nullable(),
});

export type SceneSearchConfig = z.infer<typeof ConfigSchema>;

/**
 * Config file structure (YAML or JSON)
 */
const ConfigFileSchema = z
  .object({
    version: z.number().optional(),
    catalog: z
      .object({
        kind: z.string().optional(),
        url: z.string().optional(),
        collections: z.union([z.string(), z.array(z.string())]).optional(),
        database: z.string().optional(),
        page_size: z.number().optional(),
      })
      .strict()
      .optional(),
    reference: z.object({ url: z.string().optional() }).strict().optional(),
    tiles: z
      .object({ grid: z.string().optional(), id_property: z.string().optional() })
      .strict()
      .optional(),
    retry: z
      .object({ max_attempts: z.number().optional(), delay_ms: z.number().optional() })
      .strict()
      .optional(),
    http: z.object({ timeout_ms: z.number().optional() }).strict().optional(),
    search: z
      .object({ concurrency: z.number().optional(), check_exist: z.boolean().optional() })
      .strict()
      .optional(),
    log: z
      .object({ level: z.string().optional(), pretty: z.boolean().optional() })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export const DEFAULT_CONFIG: Omit<SceneSearchConfig, 'configPath'> = {
  version: 1,
  catalog: {
    kind: 'stac',
    url: null,
    collections: ['sentinel-1'],
    database: './scenes.db',
    pageSize: 100,
  },
  reference: {
    url: ASF_SEARCH_URL,
  },
  tiles: {
    grid: null,
    idProperty: 'tile_id',
  },
  retry: {
    maxAttempts: DEFAULT_MAX_ATTEMPTS,
    delayMs: DEFAULT_RETRY_DELAY_MS,
  },
  http: {
    timeoutMs: 60000,
  },
  search: {
    concurrency: 1,
    checkExist: true,
  },
  log: {
    level: 'info',
    pretty: true,
  },
};

const CONFIG_FILE_NAMES = [
  '.scene-searchrc',
  '.scene-searchrc.yaml',
  '.scene-searchrc.yml',
  '.scene-searchrc.json',
];

const ENV_PREFIX = 'SCENE_SEARCH_';

/**
 * Find config file in the directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

function parseConfigFile(filePath: string): ConfigFile {
  let content: unknown;
  try {
    // YAML is a superset of JSON, one parser covers every file name
    content = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`cannot read config file ${filePath}`, [], { cause: error });
  }
  const result = ConfigFileSchema.safeParse(content ?? {});
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`invalid config file ${filePath}: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

class EnvReader {
  constructor(private readonly env: NodeJS.ProcessEnv) {}

  string(name: string): string | undefined {
    const value = this.env[`${ENV_PREFIX}${name}`];
    return value === undefined || value === '' ? undefined : value;
  }

  /** NaN for non-numeric values, so validation reports them */
  number(name: string): number | undefined {
    const value = this.string(name);
    return value === undefined ? undefined : Number(value);
  }

  bool(name: string): boolean | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    return value.toLowerCase() === 'true' || value === '1';
  }

  list(name: string): string[] | undefined {
    return this.string(name)
      ?.split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
}

/**
 * Values set from command-line flags
 */
export interface ConfigOverrides {
  readonly catalogKind?: CatalogKind;
  readonly catalogUrl?: string;
  readonly collections?: readonly string[];
  readonly database?: string;
  readonly tileGrid?: string;
  readonly concurrency?: number;
  readonly timeoutMs?: number;
  readonly maxAttempts?: number;
  readonly checkExist?: boolean;
  readonly logLevel?: LogLevel;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory to search upward from (default: cwd) */
  readonly cwd?: string;
  /** Environment (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
  readonly overrides?: ConfigOverrides;
}

function locateConfigFile(options: LoadConfigOptions, env: EnvReader): string | null {
  if (options.configPath) {
    const path = resolve(options.cwd ?? process.cwd(), options.configPath);
    if (!existsSync(path)) {
      throw new ConfigurationError(`config file not found: ${path}`);
    }
    return path;
  }
  const fromEnv = env.string('CONFIG');
  if (fromEnv) {
    const path = resolve(options.cwd ?? process.cwd(), fromEnv);
    return existsSync(path) ? path : null;
  }
  return findConfigFile(options.cwd ?? process.cwd());
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigurationError for an unreadable file or any invalid value
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<SceneSearchConfig> {
  const rawEnv = options.env ?? process.env;
  const env = new EnvReader(rawEnv);
  const overrides = options.overrides ?? {};
  const configPath = locateConfigFile(options, env);
  const file: ConfigFile = configPath ? parseConfigFile(configPath) : {};

  const fileCollections = file.catalog?.collections;
  const defaults = DEFAULT_CONFIG;

  const merged = {
    version: file.version ?? defaults.version,
    catalog: {
      kind: overrides.catalogKind ?? env.string('CATALOG_KIND') ?? file.catalog?.kind ?? defaults.catalog.kind,
      url: overrides.catalogUrl ?? env.string('CATALOG_URL') ?? file.catalog?.url ?? defaults.catalog.url,
      collections:
        overrides.collections ??
        env.list('COLLECTIONS') ??
        (typeof fileCollections === 'string' ? [fileCollections] : fileCollections) ??
        defaults.catalog.collections,
      database: overrides.database ?? env.string('DATABASE') ?? file.catalog?.database ?? defaults.catalog.database,
      pageSize: env.number('PAGE_SIZE') ?? file.catalog?.page_size ?? defaults.catalog.pageSize,
    },
    reference: {
      url: env.string('REFERENCE_URL') ?? file.reference?.url ?? defaults.reference.url,
    },
    tiles: {
      grid: overrides.tileGrid ?? env.string('TILE_GRID') ?? file.tiles?.grid ?? defaults.tiles.grid,
      idProperty: env.string('TILE_ID_PROPERTY') ?? file.tiles?.id_property ?? defaults.tiles.idProperty,
    },
    retry: {
      maxAttempts:
        overrides.maxAttempts ?? env.number('MAX_ATTEMPTS') ?? file.retry?.max_attempts ?? defaults.retry.maxAttempts,
      delayMs: env.number('RETRY_DELAY_MS') ?? file.retry?.delay_ms ?? defaults.retry.delayMs,
    },
    http: {
      timeoutMs: overrides.timeoutMs ?? env.number('TIMEOUT_MS') ?? file.http?.timeout_ms ?? defaults.http.timeoutMs,
    },
    search: {
      concurrency:
        overrides.concurrency ?? env.number('CONCURRENCY') ?? file.search?.concurrency ?? defaults.search.concurrency,
      checkExist:
        overrides.checkExist ?? env.bool('CHECK_EXIST') ?? file.search?.check_exist ?? defaults.search.checkExist,
    },
    log: {
      level:
        overrides.logLevel ??
        env.string('LOG_LEVEL') ??
        parseLogLevel(rawEnv.LOG_LEVEL) ??
        file.log?.level ??
        defaults.log.level,
      pretty: env.bool('LOG_PRETTY') ?? file.log?.pretty ?? defaults.log.pretty,
    },
    configPath,
  };

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`invalid configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Resolve a configured path relative to the config file (or cwd without one)
 */
export function resolveConfigPath(config: SceneSearchConfig, path: string): string {
  const basePath = config.configPath ? dirname(config.configPath) : process.cwd();
  return resolve(basePath, path);
}
