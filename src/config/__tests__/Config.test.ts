import { describe, test, expect } from 'vitest';
import { DEFAULT_DATASET_URL, loadConfig, parseEnv } from '../Config.ts';

describe('loadConfig', () => {
    test('defaults', () => {
        expect(loadConfig({})).toEqual({
            datasetUrl: DEFAULT_DATASET_URL,
            cacheTtlMs: 3_600_000,
            apiPort: 3000,
            apiHost: '0.0.0.0',
            defaultLocation: 'United States',
        });
    });

    test('reads overrides from the environment', () => {
        const config = loadConfig({
            DATASET_URL: 'https://example.test/data.csv',
            CACHE_TTL_SECONDS: '60',
            API_PORT: '8080',
            API_HOST: '127.0.0.1',
            DEFAULT_LOCATION: 'Finland',
        });

        expect(config).toEqual({
            datasetUrl: 'https://example.test/data.csv',
            cacheTtlMs: 60_000,
            apiPort: 8080,
            apiHost: '127.0.0.1',
            defaultLocation: 'Finland',
        });
    });

    test('empty variables take their defaults', () => {
        expect(loadConfig({ API_PORT: '', DATASET_URL: '' })).toMatchObject({
            datasetUrl: DEFAULT_DATASET_URL,
            apiPort: 3000,
        });
    });

    test('invalid numbers fail fast with the offending variable', () => {
        expect(() => loadConfig({ API_PORT: '70000' })).toThrow(
            /^Invalid environment configuration: \/API_PORT: /
        );
        expect(() => loadConfig({ API_PORT: '80.5' })).toThrow(
            /^Invalid environment configuration: \/API_PORT: /
        );
        expect(() => loadConfig({ CACHE_TTL_SECONDS: 'hour' })).toThrow(
            /^Invalid environment configuration: \/CACHE_TTL_SECONDS: /
        );
        expect(() => loadConfig({ CACHE_TTL_SECONDS: '-5' })).toThrow(
            /^Invalid environment configuration: \/CACHE_TTL_SECONDS: /
        );
    });
});

describe('parseEnv', () => {
    test('returns validated variables with defaults filled in', () => {
        expect(parseEnv({ CACHE_TTL_SECONDS: '0' })).toEqual({
            DATASET_URL: DEFAULT_DATASET_URL,
            CACHE_TTL_SECONDS: 0,
            API_PORT: 3000,
            API_HOST: '0.0.0.0',
            DEFAULT_LOCATION: 'United States',
        });
    });
});
