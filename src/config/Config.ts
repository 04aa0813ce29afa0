import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

export const DEFAULT_DATASET_URL =
    'https://covid.ourworldindata.org/data/owid-covid-data.csv';

/**
 * Environment variables the dashboard reads
 */
export const EnvSchema = Type.Object({
    DATASET_URL: Type.String({ minLength: 1 }),
    CACHE_TTL_SECONDS: Type.Integer({ minimum: 0 }),
    API_PORT: Type.Integer({ minimum: 1, maximum: 65535 }),
    API_HOST: Type.String({ minLength: 1 }),
    DEFAULT_LOCATION: Type.String({ minLength: 1 }),
});

export type Env = Static<typeof EnvSchema>;

export interface AppConfig {
    datasetUrl: string;
    cacheTtlMs: number;
    apiPort: number;
    apiHost: string;
    defaultLocation: string;
}

const numberOr = (raw: string | undefined, fallback: number): number =>
    raw !== undefined && raw.trim() !== '' ? Number(raw) : fallback;

/**
 * Parses and validates the environment; unset or empty variables take their defaults
 */
export function parseEnv(env: NodeJS.ProcessEnv): Env {
    const rawEnv = {
        DATASET_URL: env['DATASET_URL'] || DEFAULT_DATASET_URL,
        CACHE_TTL_SECONDS: numberOr(env['CACHE_TTL_SECONDS'], 3600),
        API_PORT: numberOr(env['API_PORT'], 3000),
        API_HOST: env['API_HOST'] || '0.0.0.0',
        DEFAULT_LOCATION: env['DEFAULT_LOCATION'] || 'United States',
    };

    if (!Value.Check(EnvSchema, rawEnv)) {
        const errors = [...Value.Errors(EnvSchema, rawEnv)];
        const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
        throw new Error(`Invalid environment configuration: ${errorMessages}`);
    }

    return rawEnv;
}

/**
 * Reads the application config from environment variables.
 * Invalid values fail at startup rather than on the first request.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = parseEnv(env);
    return {
        datasetUrl: parsed.DATASET_URL,
        cacheTtlMs: parsed.CACHE_TTL_SECONDS * 1000,
        apiPort: parsed.API_PORT,
        apiHost: parsed.API_HOST,
        defaultLocation: parsed.DEFAULT_LOCATION,
    };
}
