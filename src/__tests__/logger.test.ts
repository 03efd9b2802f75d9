import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import { getLogger, initLogger } from '../utils/logger.js';

vi.mock('pino', async (importOriginal) => {
    const actual = await importOriginal<typeof import('pino')>();
    return { ...actual, pino: vi.fn(actual.pino) };
});

// Tests share the module-level logger, so they run in order
describe('Logger', () => {
    it('should default to a plain info logger without a transport', () => {
        const logger = getLogger();

        expect(logger.level).toBe('info');
        expect(vi.mocked(pino).mock.calls).toEqual([[{ level: 'info' }]]);
        expect(getLogger()).toBe(logger);
    });

    it('should hand out the logger built by initLogger', () => {
        const logger = initLogger({ level: 'debug', jsonLogs: true });

        expect(getLogger()).toBe(logger);
        expect(getLogger().level).toBe('debug');
        expect(vi.mocked(pino)).toHaveBeenLastCalledWith({ level: 'debug' });
    });
});
