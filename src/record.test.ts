import { describe, expect, it, vi } from 'vitest';
import { Level } from './level';
import { callSite, kv, LogRecord, UNKNOWN_CALL_SITE } from './record';

describe('callSite', () => {
    it('fills omitted fields and defaults target to module', () => {
        const site = callSite({ file: 'src/server.ts', line: 12, module: 'server' });
        expect(site).toEqual({
            file: 'src/server.ts',
            line: 12,
            column: 0,
            function: '',
            module: 'server',
            target: 'server',
        });
        expect(Object.isFrozen(site)).toBe(true);
    });

    it('keeps an explicit target', () => {
        expect(callSite({ module: 'db', target: 'db::pool' }).target).toBe('db::pool');
    });

    it('blanks fields passed as undefined', () => {
        expect(callSite({ file: undefined, line: undefined, module: 'db' })).toEqual({
            file: '',
            line: 0,
            column: 0,
            function: '',
            module: 'db',
            target: 'db',
        });
    });
});

describe('kv', () => {
    it('returns an empty list for no data', () => {
        expect(kv()).toEqual([]);
    });

    it('turns an object into ordered pairs', () => {
        expect(kv({ a: 1, b: 'two' })).toEqual([['a', 1], ['b', 'two']]);
    });

    it('passes pair lists through unchanged', () => {
        const pairs = [['k', 1], ['k', 2]] as const;
        expect(kv(pairs)).toBe(pairs);
    });
});

describe('LogRecord', () => {
    it('exposes level, values and call site', () => {
        const site = callSite({ file: 'a.ts', line: 3, column: 7, function: 'run', module: 'jobs' });
        const record = new LogRecord(Level.Warning, 'slow', [['ms', 900]], site);

        expect(record.level).toBe(Level.Warning);
        expect(record.msg()).toBe('slow');
        expect(record.values()).toEqual([['ms', 900]]);
        expect(record.site).toBe(site);
        expect([record.file, record.line, record.column, record.function, record.module, record.target])
            .toEqual(['a.ts', 3, 7, 'run', 'jobs', 'jobs']);
    });

    it('defaults to no values and an unknown call site', () => {
        const record = new LogRecord(Level.Info, 'hi');
        expect(record.values()).toEqual([]);
        expect(record.site).toBe(UNKNOWN_CALL_SITE);
    });

    it('resolves a message thunk once', () => {
        const build = vi.fn(() => 'built');
        const record = new LogRecord(Level.Debug, build);
        expect(build).not.toHaveBeenCalled();

        expect(record.msg()).toBe('built');
        expect(record.msg()).toBe('built');
        expect(build).toHaveBeenCalledOnce();
    });
});
