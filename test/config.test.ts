import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { compilePatterns, endpointFor, loadConfig, parseConfig } from '../src/config';
import { ConfigurationError } from '../src/errors';

const YAML_CONFIG = `
source:
  region: eu-west-1
  accessKey: test-access-key
  secretKey: test-secret
destination:
  endpoint: http://localhost:9000
  profile: backup
bucketSuffix: -copy
partConcurrency: 8
`;

describe('parseConfig', () => {
  it('reads a YAML configuration and applies defaults', () => {
    const config = parseConfig(YAML_CONFIG, '.yaml');

    expect(config.source).toEqual({
      region: 'eu-west-1',
      accessKey: 'test-access-key',
      secretKey: 'test-secret',
    });
    expect(config.destination).toEqual({
      region: 'us-east-1',
      endpoint: 'http://localhost:9000',
      profile: 'backup',
    });
    expect(config).toMatchObject({
      bucketSuffix: '-copy',
      partConcurrency: 8,
      onObjectError: 'continue',
      onBucketError: 'halt',
      dryRun: false,
      skipConfirmation: false,
      verbose: false,
    });
  });

  it('reads a JSON configuration', () => {
    const config = parseConfig(
      JSON.stringify({
        source: { region: 'garage' },
        destination: { region: 'ap-northeast-1' },
        buckets: ['photos'],
        onObjectError: 'halt',
        onBucketError: 'continue',
        dryRun: true,
      }),
      '.json'
    );

    expect(config).toMatchObject({
      source: { region: 'garage' },
      destination: { region: 'ap-northeast-1' },
      buckets: ['photos'],
      onObjectError: 'halt',
      onBucketError: 'continue',
      dryRun: true,
    });
  });

  it('treats an empty file as an all-defaults configuration', () => {
    const config = parseConfig('', '.yml');

    expect(config.source.region).toBe('us-east-1');
    expect(config.destination.region).toBe('us-east-1');
  });

  it('applies environment overrides over the file', () => {
    const config = parseConfig(YAML_CONFIG, '.yaml', {
      SOURCE_AWS_REGION: 'ap-south-1',
      DESTINATION_AWS_ENDPOINT_URL: 'http://127.0.0.1:9100',
      DESTINATION_BUCKET_SUFFIX: '-env',
      SOURCE_AWS_ENDPOINT_URL: '',
    });

    expect(config.source.region).toBe('ap-south-1');
    expect(config.source.endpoint).toBeUndefined();
    expect(config.destination.endpoint).toBe('http://127.0.0.1:9100');
    expect(config.bucketSuffix).toBe('-env');
  });

  it('rejects unsupported formats', () => {
    expect(() => parseConfig('', '.toml')).toThrow('Unsupported configuration file format: .toml');
  });

  it('rejects content that does not parse', () => {
    expect(() => parseConfig('{ not json', '.json')).toThrow(ConfigurationError);
    expect(() => parseConfig('{ not json', '.json')).toThrow(/^Failed to parse configuration file/);
  });

  it('rejects an access key without a secret key', () => {
    expect(() => parseConfig('source:\n  accessKey: test-access-key\n', '.yaml')).toThrow(
      'Source accessKey and secretKey must be set together'
    );
  });

  it('rejects an endpoint that is not a URL', () => {
    expect(() => parseConfig('destination:\n  endpoint: not a url\n', '.yaml')).toThrow(
      'Destination endpoint is not a valid URL: not a url'
    );
  });

  it('rejects values of the wrong type', () => {
    expect(() => parseConfig('source: text\n', '.yaml')).toThrow('Source configuration must be an object');
    expect(() => parseConfig('partConcurrency: 0\n', '.yaml')).toThrow('Part concurrency must be a positive integer');
    expect(() => parseConfig('onObjectError: skip\n', '.yaml')).toThrow(
      'onObjectError must be either "continue" or "halt"'
    );
    expect(() => parseConfig('buckets: photos\n', '.yaml')).toThrow('Buckets must be an array');
    expect(() => parseConfig('dryRun: "yes"\n', '.yaml')).toThrow('dryRun must be a boolean');
  });

  it('rejects invalid patterns up front', () => {
    expect(() => parseConfig('include:\n  - "("\n', '.yaml')).toThrow('Invalid include pattern "("');
  });
});

describe('loadConfig', () => {
  let directory: string | undefined;

  afterEach(() => {
    if (directory) {
      fs.rmSync(directory, { recursive: true, force: true });
      directory = undefined;
    }
  });

  it('loads a configuration file from disk', () => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'bucket-relay-'));
    const file = path.join(directory, 'config.yaml');
    fs.writeFileSync(file, YAML_CONFIG);

    const config = loadConfig(file, {});

    expect(config.source.region).toBe('eu-west-1');
    expect(endpointFor(config, 'destination').profile).toBe('backup');
  });

  it('fails on a missing file', () => {
    expect(() => loadConfig(path.join(os.tmpdir(), 'bucket-relay-missing', 'config.yaml'), {})).toThrow(
      ConfigurationError
    );
  });
});

describe('compilePatterns', () => {
  it('compiles every pattern', () => {
    const [pattern] = compilePatterns(['^logs/'], 'exclude');

    expect(pattern.test('logs/today.txt')).toBe(true);
    expect(compilePatterns(undefined, 'include')).toEqual([]);
  });
});
