// src/level.ts
// Severities and filter thresholds.
// Lower ordinal = more severe. `FilterLevel.Off` sits below every severity, so it lets nothing through.

import { InvalidLevelNameError } from './errors';

/* ---------------------------------- Types ---------------------------------- */

/**
 * Severity of a record, most severe first.
 */
export enum Level {
    Critical = 1,
    Error = 2,
    Warning = 3,
    Info = 4,
    Debug = 5,
    Trace = 6,
}

/**
 * Threshold used by filters and the static ceiling.
 * Shares ordinals with `Level`; `Off` excludes everything.
 */
export enum FilterLevel {
    Off = 0,
    Critical = 1,
    Error = 2,
    Warning = 3,
    Info = 4,
    Debug = 5,
    Trace = 6,
}

/* --------------------------------- Tables ---------------------------------- */

// Indexed by ordinal.
const NAMES = ['OFF', 'CRITICAL', 'ERROR', 'WARNING', 'INFO', 'DEBUG', 'TRACE'] as const;
const SHORT_NAMES = ['OFF', 'CRIT', 'ERRO', 'WARN', 'INFO', 'DEBG', 'TRCE'] as const;

const ALIASES: ReadonlyMap<string, FilterLevel> = new Map([
    ['off', FilterLevel.Off], ['o', FilterLevel.Off],
    ['critical', FilterLevel.Critical], ['crit', FilterLevel.Critical], ['c', FilterLevel.Critical],
    ['error', FilterLevel.Error], ['erro', FilterLevel.Error], ['e', FilterLevel.Error],
    ['warning', FilterLevel.Warning], ['warn', FilterLevel.Warning], ['w', FilterLevel.Warning],
    ['info', FilterLevel.Info], ['i', FilterLevel.Info],
    ['debug', FilterLevel.Debug], ['debg', FilterLevel.Debug], ['d', FilterLevel.Debug],
    ['trace', FilterLevel.Trace], ['trce', FilterLevel.Trace], ['t', FilterLevel.Trace],
]);

const LEVELS: readonly Level[] = [
    Level.Critical, Level.Error, Level.Warning, Level.Info, Level.Debug, Level.Trace,
];
const FILTER_LEVELS: readonly FilterLevel[] = [
    FilterLevel.Off, FilterLevel.Critical, FilterLevel.Error, FilterLevel.Warning,
    FilterLevel.Info, FilterLevel.Debug, FilterLevel.Trace,
];

/* -------------------------------- Ordinals --------------------------------- */

export function levelAsOrdinal(level: Level): number {
    return level;
}

export function filterLevelAsOrdinal(level: FilterLevel): number {
    return level;
}

export function levelFromOrdinal(n: number): Level | undefined {
    return LEVELS[n - 1];
}

export function filterLevelFromOrdinal(n: number): FilterLevel | undefined {
    return FILTER_LEVELS[n];
}

export function toFilterLevel(level: Level): FilterLevel {
    return FILTER_LEVELS[level] ?? FilterLevel.Off;
}

/**
 * True when a record at `level` passes `threshold`.
 * `levelAsOrdinal(level) <= filterLevelAsOrdinal(threshold)`.
 */
export function isLevelEnabled(level: Level, threshold: FilterLevel): boolean {
    return levelAsOrdinal(level) <= filterLevelAsOrdinal(threshold);
}

/* ---------------------------------- Names ---------------------------------- */

export function levelName(level: Level): string {
    return NAMES[level];
}

export function filterLevelName(level: FilterLevel): string {
    return NAMES[level];
}

/** Four-letter tag for aligned columns (`CRIT`, `ERRO`, `WARN`, ...). */
export function levelShortName(level: Level): string {
    return SHORT_NAMES[level];
}

/* --------------------------------- Parsing --------------------------------- */

/**
 * Resolve a level name without throwing.
 * Accepts (case-insensitive) full names, four-letter tags, `warn`, and single letters.
 * Returns `undefined` if unparsable; callers decide fallback behavior.
 */
export function tryParseFilterLevel(text: string): FilterLevel | undefined {
    return ALIASES.get(text.toLowerCase());
}

export function tryParseLevel(text: string): Level | undefined {
    const level = tryParseFilterLevel(text);
    return level === undefined ? undefined : levelFromOrdinal(level);
}

/** Parse a filter level; `off`/`o` are accepted. Throws `InvalidLevelNameError`. */
export function parseFilterLevel(text: string): FilterLevel {
    const level = tryParseFilterLevel(text);
    if (level === undefined) throw new InvalidLevelNameError(text);
    return level;
}

/** Parse a record level; `off` is not a level. Throws `InvalidLevelNameError`. */
export function parseLevel(text: string): Level {
    const level = tryParseLevel(text);
    if (level === undefined) throw new InvalidLevelNameError(text);
    return level;
}
