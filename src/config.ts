// src/config.ts
// Build-time static ceiling and runtime threshold resolution.
// - The ceiling is fixed once per process: calls above it never build a record.
// - Bundlers may inject `__LOGTREE_FEATURES__` / `__LOGTREE_OPTIMIZED__` via `define`; the environment is the fallback.

import { FilterLevel, tryParseFilterLevel } from './level';

/* ---------------------------------- Types ---------------------------------- */

export const STATIC_LEVEL_FEATURES = [
    'max_level_off',
    'max_level_error',
    'max_level_warn',
    'max_level_info',
    'max_level_debug',
    'max_level_trace',
] as const;

export const RELEASE_LEVEL_FEATURES = [
    'release_max_level_off',
    'release_max_level_error',
    'release_max_level_warn',
    'release_max_level_info',
    'release_max_level_debug',
    'release_max_level_trace',
] as const;

export type StaticLevelFeature = typeof STATIC_LEVEL_FEATURES[number];
export type ReleaseLevelFeature = typeof RELEASE_LEVEL_FEATURES[number];
export type LevelFeature = StaticLevelFeature | ReleaseLevelFeature;

// Same position in both lists → same ceiling.
const CEILINGS: readonly FilterLevel[] = [
    FilterLevel.Off,
    FilterLevel.Error,
    FilterLevel.Warning,
    FilterLevel.Info,
    FilterLevel.Debug,
    FilterLevel.Trace,
];

export type Env = Record<string, string | undefined>;

export type ResolveFilterLevelOptions = {
    /** Explicit level; wins over everything. */
    level?: FilterLevel;
    /** Environment bag. Defaults to `process.env` when available. */
    env?: Env;
    /** Level when `NODE_ENV=production` and nothing else is set. Default: Error. */
    prodDefault?: FilterLevel;
};

/* ------------------------------ Static ceiling ----------------------------- */

function firstCeiling(features: ReadonlySet<string>, names: readonly string[]): FilterLevel | undefined {
    for (let i = 0; i < names.length; i++) {
        const name = names[i];
        if (name !== undefined && features.has(name)) return CEILINGS[i];
    }
    return undefined;
}

/**
 * Resolve the static ceiling from a feature set:
 * 1) optimized builds: the most restrictive `release_max_level_*` feature
 * 2) the most restrictive `max_level_*` feature
 * 3) default: Trace, or Info for optimized builds
 * Unknown names are ignored.
 */
export function resolveStaticMaxLevel(features: Iterable<string>, optimized: boolean): FilterLevel {
    const set = new Set(features);
    if (optimized) {
        const release = firstCeiling(set, RELEASE_LEVEL_FEATURES);
        if (release !== undefined) return release;
    }
    const plain = firstCeiling(set, STATIC_LEVEL_FEATURES);
    if (plain !== undefined) return plain;
    return optimized ? FilterLevel.Info : FilterLevel.Trace;
}

/** Split a comma/space separated feature list. */
export function parseFeatures(text?: string): string[] {
    if (!text) return [];
    return text.split(/[\s,]+/).map(f => f.trim().toLowerCase()).filter(f => f.length > 0);
}

/* ------------------------- Build-time define guard ------------------------- */

// Injected by bundlers through `define`; guarded with typeof so a plain run does not throw.
declare const __LOGTREE_FEATURES__: string | undefined;
declare const __LOGTREE_OPTIMIZED__: boolean | undefined;

function processEnv(): Env | undefined {
    return typeof process !== 'undefined' ? process.env : undefined;
}

function buildFeatures(env?: Env): string[] {
    const defined = typeof __LOGTREE_FEATURES__ !== 'undefined' ? __LOGTREE_FEATURES__ : undefined;
    return parseFeatures(defined ?? env?.LOGTREE_FEATURES);
}

function buildOptimized(env?: Env): boolean {
    if (typeof __LOGTREE_OPTIMIZED__ === 'boolean') return __LOGTREE_OPTIMIZED__;
    return (env?.NODE_ENV ?? '').trim().toLowerCase() === 'production';
}

/** Static ceiling for this process, resolved once at load. */
export const STATIC_MAX_LEVEL: FilterLevel = (() => {
    const env = processEnv();
    return resolveStaticMaxLevel(buildFeatures(env), buildOptimized(env));
})();

/* ----------------------------- Runtime threshold --------------------------- */

/**
 * Resolve a runtime filter threshold in the following order:
 * 1) Explicit `level`
 * 2) `DEBUG_MODE=1|true|yes|on` → Debug
 * 3) `LOG_LEVEL=<any level name, incl. off>`
 * 4) `NODE_ENV=production` → `prodDefault` (default Error), else Info
 */
export function resolveFilterLevel(options: ResolveFilterLevelOptions = {}): FilterLevel {
    // 1) explicit
    if (options.level != null) return options.level;

    const env = options.env ?? processEnv();

    // 2) DEBUG_MODE
    const dm = env?.DEBUG_MODE?.trim().toLowerCase();
    if (dm === '1' || dm === 'true' || dm === 'yes' || dm === 'on') return FilterLevel.Debug;

    // 3) LOG_LEVEL
    const raw = env?.LOG_LEVEL?.trim();
    const level = raw ? tryParseFilterLevel(raw) : undefined;
    if (level !== undefined) return level;

    // 4) NODE_ENV
    return env?.NODE_ENV?.trim().toLowerCase() === 'production' ? (options.prodDefault ?? FilterLevel.Error) : FilterLevel.Info;
}
