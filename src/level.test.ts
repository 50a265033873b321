import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { InvalidLevelNameError } from './errors';
import {
    FilterLevel,
    filterLevelAsOrdinal,
    filterLevelFromOrdinal,
    filterLevelName,
    isLevelEnabled,
    Level,
    levelAsOrdinal,
    levelFromOrdinal,
    levelName,
    levelShortName,
    parseFilterLevel,
    parseLevel,
    toFilterLevel,
    tryParseFilterLevel,
    tryParseLevel,
} from './level';

const LEVELS = [Level.Critical, Level.Error, Level.Warning, Level.Info, Level.Debug, Level.Trace];
const ALL_FILTERS = [FilterLevel.Off, ...LEVELS.map(toFilterLevel)];

const arbLevel = fc.constantFrom(...LEVELS);
const arbFilter = fc.constantFrom(...ALL_FILTERS);

/** Randomly upper/lower-case each character. */
const arbCasing = (text: string) =>
    fc.array(fc.boolean(), { minLength: text.length, maxLength: text.length })
        .map(flags => [...text].map((ch, i) => flags[i] ? ch.toUpperCase() : ch.toLowerCase()).join(''));

describe('level ordering', () => {
    it('lower ordinal means strictly more severe', () => {
        fc.assert(
            fc.property(arbLevel, arbLevel, (a, b) => {
                const moreSevere = LEVELS.indexOf(a) < LEVELS.indexOf(b);
                expect(levelAsOrdinal(a) < levelAsOrdinal(b)).toBe(moreSevere);
            }),
        );
    });

    it('Off is below every severity and accepts nothing', () => {
        for (const level of LEVELS) {
            expect(filterLevelAsOrdinal(FilterLevel.Off)).toBeLessThan(levelAsOrdinal(level));
            expect(isLevelEnabled(level, FilterLevel.Off)).toBe(false);
        }
    });

    it('a level passes a threshold iff its ordinal is not greater', () => {
        fc.assert(
            fc.property(arbLevel, arbFilter, (level, threshold) => {
                expect(isLevelEnabled(level, threshold)).toBe(levelAsOrdinal(level) <= filterLevelAsOrdinal(threshold));
            }),
        );
    });

    it('a level always passes its own threshold', () => {
        for (const level of LEVELS) {
            expect(isLevelEnabled(level, toFilterLevel(level))).toBe(true);
        }
    });

    it('converts ordinals back to levels', () => {
        expect(levelFromOrdinal(1)).toBe(Level.Critical);
        expect(levelFromOrdinal(6)).toBe(Level.Trace);
        expect(levelFromOrdinal(0)).toBeUndefined();
        expect(levelFromOrdinal(7)).toBeUndefined();
        expect(filterLevelFromOrdinal(0)).toBe(FilterLevel.Off);
        expect(filterLevelFromOrdinal(6)).toBe(FilterLevel.Trace);
        expect(filterLevelFromOrdinal(-1)).toBeUndefined();
    });
});

describe('level names', () => {
    it('has full and short names', () => {
        expect(LEVELS.map(levelName)).toEqual(['CRITICAL', 'ERROR', 'WARNING', 'INFO', 'DEBUG', 'TRACE']);
        expect(LEVELS.map(levelShortName)).toEqual(['CRIT', 'ERRO', 'WARN', 'INFO', 'DEBG', 'TRCE']);
        expect(filterLevelName(FilterLevel.Off)).toBe('OFF');
    });
});

describe('level parsing', () => {
    it('round-trips every name regardless of case', () => {
        fc.assert(
            fc.property(
                arbLevel.chain(level => fc.tuple(fc.constant(level), arbCasing(levelName(level)))),
                ([level, name]) => {
                    expect(parseLevel(name)).toBe(level);
                },
            ),
        );
    });

    it('round-trips filter level names', () => {
        for (const level of ALL_FILTERS) {
            expect(parseFilterLevel(filterLevelName(level))).toBe(level);
        }
    });

    it('accepts single-letter abbreviations', () => {
        expect(['c', 'E', 'w', 'I', 'd', 'T'].map(parseLevel)).toEqual(LEVELS);
        expect(parseFilterLevel('o')).toBe(FilterLevel.Off);
        expect(parseFilterLevel('OFF')).toBe(FilterLevel.Off);
    });

    it('accepts short tags and warn', () => {
        expect(['crit', 'erro', 'warn', 'info', 'debg', 'trce'].map(parseLevel)).toEqual(LEVELS);
    });

    it('does not accept off as a record level', () => {
        expect(() => parseLevel('off')).toThrow(InvalidLevelNameError);
        expect(() => parseLevel('o')).toThrow(InvalidLevelNameError);
        expect(tryParseLevel('off')).toBeUndefined();
    });

    it('rejects unknown text', () => {
        for (const text of ['', 'verbose', 'x', ' info', 'fatal']) {
            expect(() => parseLevel(text)).toThrow(InvalidLevelNameError);
            expect(() => parseFilterLevel(text)).toThrow(InvalidLevelNameError);
            expect(tryParseFilterLevel(text)).toBeUndefined();
        }
    });

    it('error carries a code', () => {
        try {
            parseLevel('nope');
            expect.unreachable();
        } catch (e) {
            expect(e).toBeInstanceOf(InvalidLevelNameError);
            expect(e).toMatchObject({ code: 'INVALID_LEVEL_NAME', name: 'InvalidLevelNameError' });
        }
    });
});
