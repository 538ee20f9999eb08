/**
 * Configuration loader for list-resolver
 * Optional YAML config file with environment variable expansion; every key has a default.
 */

import fs from 'node:fs';
import path from 'node:path';

import { parse } from 'yaml';

import { createLogger, errorMessage } from './log.js';
import type {
  LookupConfig,
  PathsConfig,
  ResolverConfig,
  TranslatorConfig,
} from './types.js';

const log = createLogger('config');

const DEFAULT_CONCURRENCY = 5;

const DEFAULT_PATHS: PathsConfig = {
  inputDir: '/input',
  outputDir: '/output',
  reportDir: '/data/list-resolver',
};

const DEFAULT_LOOKUP: Omit<LookupConfig, 'url' | 'apiKey'> = {
  endpoint: '/api/v3/movie/lookup',
  apiKeyFiles: ['/data/radarr/config/config.xml', '../data/radarr/config/config.xml'],
  timeoutMs: 30_000,
};

const DEFAULT_TRANSLATOR: Omit<TranslatorConfig, 'url'> = {
  enabled: true,
  source: 'es',
  target: 'en',
  timeoutMs: 30_000,
  maxAttempts: 3,
  baseDelayMs: 1000,
};

const API_KEY_PATTERN = /<ApiKey>([^<]+)<\/ApiKey>/;

type RawSection = Record<string, unknown>;

/**
 * Expand environment variables in a string
 * Supports ${VAR} syntax
 */
function expandEnv(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  return value.replace(/\$\{([^}]+)\}/g, (_, name: string) => process.env[name] ?? '');
}

/**
 * Recursively expand environment variables in an object
 */
function deepExpand(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map(deepExpand);
  if (obj && typeof obj === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      out[k] = deepExpand(v);
    }
    return out;
  }
  return expandEnv(obj);
}

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawSection, key: string): RawSection {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function str(value: unknown): string | undefined {
  if (typeof value === 'number') return String(value);
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function bool(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}

function positiveInt(value: unknown, key: string, fallback: number): number {
  if (value === undefined || value === null || value === '') return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${key} must be a positive integer (got ${JSON.stringify(value)})`);
  }
  return n;
}

function stringList(value: unknown): string[] | undefined {
  if (typeof value === 'string' && value.trim() !== '') return [value.trim()];
  if (!Array.isArray(value)) return undefined;
  const list = value.filter((v): v is string => typeof v === 'string' && v.trim() !== '');
  return list.length ? list : undefined;
}

/**
 * Resolve a service URL. Inside Docker a missing or loopback URL points at the
 * compose service hostname; outside Docker it falls back to the LAN host.
 */
export function deriveServiceUrl(
  rawUrl: string | undefined,
  service: { host: string; port: number; portEnv: string }
): string {
  const inDocker = fs.existsSync('/.dockerenv');
  if (inDocker) {
    if (!rawUrl || /(^https?:\/\/)?(localhost|127\.)/i.test(rawUrl)) {
      return `http://${service.host}:${service.port}`;
    }
    return rawUrl.replace(/\/$/, '');
  }

  if (rawUrl) return rawUrl.replace(/\/$/, '');

  const host = process.env.LAN_HOSTNAME || process.env.HOST_IP || 'localhost';
  const port = process.env[service.portEnv] || String(service.port);
  return `http://${host}${port ? `:${port}` : ''}`;
}

/**
 * Read the API key out of a Radarr config.xml. Returns null when the file is
 * missing or carries no <ApiKey> tag.
 */
export function readApiKeyFromXml(filePath: string): string | null {
  if (!fs.existsSync(filePath)) return null;
  const match = API_KEY_PATTERN.exec(fs.readFileSync(filePath, 'utf-8'));
  return match ? match[1].trim() : null;
}

function resolveApiKey(configured: string | undefined, keyFiles: string[]): string {
  const direct = configured ?? str(process.env.RADARR_API_KEY);
  if (direct) return direct;

  for (const candidate of keyFiles) {
    try {
      const key = readApiKeyFromXml(candidate);
      if (key) return key;
    } catch (err) {
      log.warn(`Error reading Radarr config ${candidate}: ${errorMessage(err)}`);
    }
  }

  log.warn(`Could not find API key in config file at: ${keyFiles.join(', ') || '(none)'}`);
  return '';
}

/**
 * Find config file from multiple candidate locations
 */
function findConfigFile(baseDir: string): string | null {
  const candidates = [
    process.env.LIST_RESOLVER_CONFIG,
    path.join(baseDir, 'config/config.yaml'),
    path.join(baseDir, 'config.yaml'),
    path.join(process.cwd(), 'list-resolver.yaml'),
  ].filter((p): p is string => Boolean(p));

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

function readRaw(configPath: string | null): RawSection {
  if (!configPath) return {};
  const parsed = deepExpand(parse(fs.readFileSync(configPath, 'utf-8')));
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new Error(`Config file ${configPath} must contain a mapping at the top level`);
  }
  return parsed;
}

/**
 * Load configuration. A missing config file is not an error: defaults apply.
 */
export function loadConfig(baseDir: string): ResolverConfig {
  const configPath = findConfigFile(baseDir);
  const raw = readRaw(configPath);

  const paths = section(raw, 'paths');
  const lookup = section(raw, 'lookup');
  const translator = section(raw, 'translator');
  const selection = section(raw, 'selection');
  const report = section(raw, 'report');

  const apiKeyFiles = stringList(lookup.apiKeyFiles) ?? DEFAULT_LOOKUP.apiKeyFiles;

  return {
    concurrency: positiveInt(raw.concurrency, 'concurrency', DEFAULT_CONCURRENCY),
    paths: {
      inputDir: str(paths.inputDir) ?? DEFAULT_PATHS.inputDir,
      outputDir: str(paths.outputDir) ?? DEFAULT_PATHS.outputDir,
      reportDir: str(paths.reportDir) ?? DEFAULT_PATHS.reportDir,
    },
    lookup: {
      url: deriveServiceUrl(str(lookup.url), { host: 'radarr', port: 7878, portEnv: 'RADARR_PORT' }),
      endpoint: str(lookup.endpoint) ?? DEFAULT_LOOKUP.endpoint,
      apiKey: resolveApiKey(str(lookup.apiKey), apiKeyFiles),
      apiKeyFiles,
      timeoutMs: positiveInt(lookup.timeoutMs, 'lookup.timeoutMs', DEFAULT_LOOKUP.timeoutMs),
    },
    translator: {
      enabled: bool(translator.enabled) ?? DEFAULT_TRANSLATOR.enabled,
      url: deriveServiceUrl(str(translator.url), {
        host: 'libretranslate',
        port: 5000,
        portEnv: 'LIBRETRANSLATE_PORT',
      }),
      source: str(translator.source) ?? DEFAULT_TRANSLATOR.source,
      target: str(translator.target) ?? DEFAULT_TRANSLATOR.target,
      timeoutMs: positiveInt(translator.timeoutMs, 'translator.timeoutMs', DEFAULT_TRANSLATOR.timeoutMs),
      maxAttempts: positiveInt(translator.maxAttempts, 'translator.maxAttempts', DEFAULT_TRANSLATOR.maxAttempts),
      baseDelayMs: positiveInt(translator.baseDelayMs, 'translator.baseDelayMs', DEFAULT_TRANSLATOR.baseDelayMs),
    },
    selection: {
      interactive: bool(selection.interactive) ?? false,
    },
    report: {
      enabled: bool(report.enabled) ?? true,
    },
  };
}

/**
 * Get config file path for display
 */
export function getConfigPath(baseDir: string): string | null {
  return findConfigFile(baseDir);
}
