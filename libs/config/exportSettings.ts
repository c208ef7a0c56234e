import { z } from 'zod';
import { validate } from '../validation/zod-middleware.js';

/**
 * Process-wide export configuration.
 *
 * Every destination owns its own keys; a destination whose keys are absent
 * simply reports `enabled === false`. Empty strings are treated as unset so
 * that `FOO=` in an env file disables rather than breaks a destination.
 */

const DEFAULT_STRATEGY = 'all';

const LEGACY_STRATEGY_NAMES: Record<string, string> = {
    first_success: 'firstSuccess',
    best_effort: 'bestEffort'
};

const optionalString = z.preprocess(
    value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.string().trim().optional()
);

const optionalUrl = z.preprocess(
    value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.string().trim().url().optional()
);

const optionalInt = z.preprocess(
    value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().int().nonnegative().optional()
);

const CoreEnvSchema = z.object({
    // Only legacy spellings are normalised here; unknown names are rejected by the
    // orchestrator before dispatch.
    EXPORT_STRATEGY: z.preprocess(
        value => {
            if (typeof value !== 'string' || value.trim() === '') return undefined;
            return LEGACY_STRATEGY_NAMES[value] ?? value;
        },
        z.string().default(DEFAULT_STRATEGY)
    ),
    EXPORT_HTTP_TIMEOUT_MS: z.preprocess(
        value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
        z.coerce.number().int().positive().default(30_000)
    )
});

const CdcsEnvSchema = z.object({
    CDCS_URL: optionalUrl,
    CDCS_TOKEN: optionalString
});

const ElabftwEnvSchema = z.object({
    ELABFTW_URL: optionalUrl,
    ELABFTW_API_KEY: optionalString,
    ELABFTW_EXPERIMENT_CATEGORY: optionalInt,
    ELABFTW_EXPERIMENT_STATUS: optionalInt
});

const LabArchivesEnvSchema = z.object({
    LABARCHIVES_URL: optionalUrl,
    LABARCHIVES_API_KEY: optionalString
});

export interface CoreExportSettings {
    /** Strategy name as configured; validated when an export starts */
    readonly strategy: string;
    readonly httpTimeoutMs: number;
}

export interface CdcsSettings {
    readonly url?: string;
    readonly token?: string;
}

export interface ElabftwSettings {
    readonly url?: string;
    readonly apiKey?: string;
    readonly experimentCategory?: number;
    readonly experimentStatus?: number;
}

export interface LabArchivesSettings {
    readonly url?: string;
    readonly apiKey?: string;
}

export interface ExportSettings extends CoreExportSettings {
    readonly cdcs: CdcsSettings;
    readonly elabftw: ElabftwSettings;
    readonly labarchives: LabArchivesSettings;
}

/*
 * Each section is parsed on its own, so a malformed eLabFTW key cannot
 * take CDCS down with it.
 */

export function loadCoreSettings(env: NodeJS.ProcessEnv = process.env): CoreExportSettings {
    const parsed = validate(CoreEnvSchema, env, 'ExportSettings:Core');
    return Object.freeze({
        strategy: parsed.EXPORT_STRATEGY,
        httpTimeoutMs: parsed.EXPORT_HTTP_TIMEOUT_MS
    });
}

export function loadCdcsSettings(env: NodeJS.ProcessEnv = process.env): CdcsSettings {
    const parsed = validate(CdcsEnvSchema, env, 'ExportSettings:CDCS');
    return Object.freeze({ url: parsed.CDCS_URL, token: parsed.CDCS_TOKEN });
}

export function loadElabftwSettings(env: NodeJS.ProcessEnv = process.env): ElabftwSettings {
    const parsed = validate(ElabftwEnvSchema, env, 'ExportSettings:eLabFTW');
    return Object.freeze({
        url: parsed.ELABFTW_URL,
        apiKey: parsed.ELABFTW_API_KEY,
        experimentCategory: parsed.ELABFTW_EXPERIMENT_CATEGORY,
        experimentStatus: parsed.ELABFTW_EXPERIMENT_STATUS
    });
}

export function loadLabArchivesSettings(env: NodeJS.ProcessEnv = process.env): LabArchivesSettings {
    const parsed = validate(LabArchivesEnvSchema, env, 'ExportSettings:LabArchives');
    return Object.freeze({ url: parsed.LABARCHIVES_URL, apiKey: parsed.LABARCHIVES_API_KEY });
}

/**
 * All export settings at once. Throws on the first malformed section.
 */
export function loadExportSettings(env: NodeJS.ProcessEnv = process.env): ExportSettings {
    return Object.freeze({
        ...loadCoreSettings(env),
        cdcs: loadCdcsSettings(env),
        elabftw: loadElabftwSettings(env),
        labarchives: loadLabArchivesSettings(env)
    });
}

function cached<T>(load: () => T): () => T {
    let value: T | undefined;
    return () => {
        if (value === undefined) {
            value = load();
        }
        return value;
    };
}

/*
 * Sections for the running process, parsed once from `process.env`.
 * A section that fails to parse is retried on the next call.
 */
export const getCoreSettings = cached(() => loadCoreSettings(process.env));
export const getCdcsSettings = cached(() => loadCdcsSettings(process.env));
export const getElabftwSettings = cached(() => loadElabftwSettings(process.env));
export const getLabArchivesSettings = cached(() => loadLabArchivesSettings(process.env));
