// Node.js built-in modules
import fs from 'node:fs';
import path from 'node:path';

// Third-party dependencies
import yaml from 'js-yaml';

// Local imports
import { ConfigurationError } from './errors';

// Types
import type { BucketErrorPolicy, EndpointConfig, EndpointRole, MigrationConfig, ObjectErrorPolicy } from './types';

export const DEFAULT_REGION = 'us-east-1';

// Environment variables applied over the configuration file
export const ENVIRONMENT_OVERRIDES = {
  sourceRegion: 'SOURCE_AWS_REGION',
  sourceEndpoint: 'SOURCE_AWS_ENDPOINT_URL',
  destinationRegion: 'DESTINATION_AWS_REGION',
  destinationEndpoint: 'DESTINATION_AWS_ENDPOINT_URL',
  bucketSuffix: 'DESTINATION_BUCKET_SUFFIX',
} as const;

type Environment = Record<string, string | undefined>;
type RawObject = Record<string, unknown>;

/**
 * Load and parse the configuration file
 * @param configPath Path to the configuration file (YAML or JSON)
 * @param env Environment to read overrides from
 * @returns Validated configuration with defaults applied
 */
export function loadConfig(configPath: string, env: Environment = process.env): MigrationConfig {
  const resolvedPath = path.resolve(configPath);

  if (!fs.existsSync(resolvedPath)) {
    throw new ConfigurationError(`Configuration file not found: ${resolvedPath}`);
  }

  const fileContent = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(fileContent, path.extname(resolvedPath).toLowerCase(), env);
}

/**
 * Parse configuration text of the given format ('.json', '.yaml' or '.yml')
 */
export function parseConfig(content: string, format: string, env: Environment = {}): MigrationConfig {
  let raw: unknown;

  if (format !== '.json' && format !== '.yaml' && format !== '.yml') {
    throw new ConfigurationError(`Unsupported configuration file format: ${format}`);
  }

  try {
    raw = format === '.json' ? JSON.parse(content) : yaml.load(content);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse configuration file: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }

  return validateConfig(applyEnvironment(raw ?? {}, env));
}

/**
 * Overlay the supported environment variables on the raw configuration
 */
function applyEnvironment(raw: unknown, env: Environment): unknown {
  if (!isObject(raw)) {
    return raw;
  }

  const source = isObject(raw.source) ? { ...raw.source } : raw.source ?? {};
  const destination = isObject(raw.destination) ? { ...raw.destination } : raw.destination ?? {};
  const result: RawObject = { ...raw, source, destination };

  if (isObject(source)) {
    setIfPresent(source, 'region', env[ENVIRONMENT_OVERRIDES.sourceRegion]);
    setIfPresent(source, 'endpoint', env[ENVIRONMENT_OVERRIDES.sourceEndpoint]);
  }
  if (isObject(destination)) {
    setIfPresent(destination, 'region', env[ENVIRONMENT_OVERRIDES.destinationRegion]);
    setIfPresent(destination, 'endpoint', env[ENVIRONMENT_OVERRIDES.destinationEndpoint]);
  }
  setIfPresent(result, 'bucketSuffix', env[ENVIRONMENT_OVERRIDES.bucketSuffix]);

  return result;
}

/**
 * Validate a raw configuration object and apply defaults
 */
export function validateConfig(raw: unknown): MigrationConfig {
  if (!isObject(raw)) {
    throw new ConfigurationError('Configuration must be an object');
  }

  const config: MigrationConfig = {
    source: validateEndpoint(raw.source, 'source'),
    destination: validateEndpoint(raw.destination, 'destination'),
    bucketSuffix: optionalString(raw.bucketSuffix, 'Bucket suffix'),
    buckets: optionalStringArray(raw.buckets, 'Buckets'),
    include: optionalStringArray(raw.include, 'Include patterns'),
    exclude: optionalStringArray(raw.exclude, 'Exclude patterns'),
    partConcurrency: optionalPositiveInteger(raw.partConcurrency, 'Part concurrency'),
    maxAttempts: optionalPositiveInteger(raw.maxAttempts, 'Max attempts'),
    onObjectError: optionalPolicy(raw.onObjectError, 'onObjectError', 'continue'),
    onBucketError: optionalPolicy(raw.onBucketError, 'onBucketError', 'halt'),
    dryRun: optionalBoolean(raw.dryRun, 'dryRun') ?? false,
    skipConfirmation: optionalBoolean(raw.skipConfirmation, 'skipConfirmation') ?? false,
    verbose: optionalBoolean(raw.verbose, 'verbose') ?? false,
    logFile: optionalString(raw.logFile, 'Log file path'),
  };

  // Surface bad patterns at startup rather than in the middle of a run
  compilePatterns(config.include, 'include');
  compilePatterns(config.exclude, 'exclude');

  return config;
}

/**
 * Compile include or exclude patterns
 */
export function compilePatterns(patterns: string[] | undefined, label: string): RegExp[] {
  return (patterns ?? []).map((pattern) => {
    try {
      return new RegExp(pattern);
    } catch (error) {
      throw new ConfigurationError(`Invalid ${label} pattern "${pattern}"`, error);
    }
  });
}

/**
 * Endpoint configuration for a role
 */
export function endpointFor(config: MigrationConfig, role: EndpointRole): EndpointConfig {
  return role === 'source' ? config.source : config.destination;
}

function validateEndpoint(raw: unknown, role: EndpointRole): EndpointConfig {
  const label = role === 'source' ? 'Source' : 'Destination';

  if (raw === undefined || raw === null) {
    throw new ConfigurationError(`${label} configuration is missing`);
  }
  if (!isObject(raw)) {
    throw new ConfigurationError(`${label} configuration must be an object`);
  }

  const region = optionalString(raw.region, `${label} region`) ?? DEFAULT_REGION;
  if (region.trim() === '') {
    throw new ConfigurationError(`${label} region must not be empty`);
  }

  const endpoint: EndpointConfig = {
    region,
    endpoint: optionalString(raw.endpoint, `${label} endpoint`),
    accessKey: optionalString(raw.accessKey, `${label} accessKey`),
    secretKey: optionalString(raw.secretKey, `${label} secretKey`),
    profile: optionalString(raw.profile, `${label} profile`),
    credentialsFile: optionalString(raw.credentialsFile, `${label} credentialsFile`),
  };

  if (endpoint.endpoint !== undefined && !URL.canParse(endpoint.endpoint)) {
    throw new ConfigurationError(`${label} endpoint is not a valid URL: ${endpoint.endpoint}`);
  }

  if ((endpoint.accessKey === undefined) !== (endpoint.secretKey === undefined)) {
    throw new ConfigurationError(`${label} accessKey and secretKey must be set together`);
  }

  return endpoint;
}

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setIfPresent(target: RawObject, field: string, value: string | undefined): void {
  if (value !== undefined && value !== '') {
    target[field] = value;
  }
}

function optionalString(value: unknown, label: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigurationError(`${label} must be a string`);
  }
  return value;
}

function optionalBoolean(value: unknown, label: string): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`${label} must be a boolean`);
  }
  return value;
}

function optionalStringArray(value: unknown, label: string): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${label} must be an array`);
  }

  const strings: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new ConfigurationError(`${label} must only contain strings`);
    }
    strings.push(item);
  }
  return strings;
}

function optionalPositiveInteger(value: unknown, label: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${label} must be a positive integer`);
  }
  return value;
}

function optionalPolicy(
  value: unknown,
  label: string,
  fallback: ObjectErrorPolicy | BucketErrorPolicy
): ObjectErrorPolicy | BucketErrorPolicy {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (value !== 'continue' && value !== 'halt') {
    throw new ConfigurationError(`${label} must be either "continue" or "halt"`);
  }
  return value;
}
