import { afterEach, describe, expect, it, vi } from 'vitest';

// The ceiling is fixed when the config module loads, so each case loads a fresh module graph.
async function loadWith(features: string) {
    vi.stubEnv('LOGTREE_FEATURES', features);
    vi.resetModules();
    const config = await import('./config');
    const logger = await import('./logger');
    const ser = await import('./ser');
    const sinks = await import('./sinks');
    return { ...config, ...logger, ...ser, ...sinks };
}

afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
});

describe('static ceiling', () => {
    it('eliminates calls above the ceiling without evaluating their arguments', async () => {
        const { Logger, MemoryDrain, lazy, STATIC_MAX_LEVEL } = await loadWith('max_level_error');
        const { FilterLevel, Level } = await import('./level');
        expect(STATIC_MAX_LEVEL).toBe(FilterLevel.Error);

        const value = vi.fn(() => 'expensive');
        const message = vi.fn(() => 'debug message');
        const drain = new MemoryDrain();
        const log = Logger.root(drain);

        log.debug(message, { detail: lazy(value) });
        log.warning('also dropped');

        expect(log.isEnabled(Level.Debug)).toBe(false);
        expect(drain.entries).toHaveLength(0);
        expect(value).not.toHaveBeenCalled();
        expect(message).not.toHaveBeenCalled();
    });

    it('still dispatches calls at or below the ceiling', async () => {
        const { Logger, MemoryDrain, lazy } = await loadWith('max_level_error');

        const value = vi.fn(() => 'computed');
        const drain = new MemoryDrain();
        const log = Logger.root(drain);

        log.error('failed', { detail: lazy(value) });
        log.critical('down');

        expect(drain.entries.map(e => e.msg)).toEqual(['failed', 'down']);
        expect(drain.entries[0]?.values).toEqual([['detail', 'computed']]);
        expect(value).toHaveBeenCalledOnce();
    });

    it('disables everything with max_level_off', async () => {
        const { Logger, MemoryDrain } = await loadWith('max_level_off');
        const drain = new MemoryDrain();

        Logger.root(drain).critical('nothing');

        expect(drain.entries).toHaveLength(0);
    });
});
