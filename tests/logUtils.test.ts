// tests/logUtils.test.ts
import { createLogger, getLogger, NoopLogFacility } from '../src/utils/logging/logUtils';

function createFacility() {
    return { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('logUtils', () => {
    it('should prefix lines with level and logger name', () => {
        const facility = createFacility();
        const logger = getLogger('log-prefix', facility);
        logger.info('hello');
        logger.warn('careful');
        logger.error('broken');
        expect(facility.log.mock.calls[0][0]).toContain('[INFO] log-prefix :: hello');
        expect(facility.warn.mock.calls[0][0]).toContain('[WARNING] log-prefix :: careful');
        expect(facility.error.mock.calls[0][0]).toContain('[ERROR] log-prefix :: broken');
        expect(logger.errorMessages).toEqual(['broken']);
    });

    it('should only print debug lines when verbose', () => {
        const quiet = createFacility();
        const quietLogger = getLogger('log-quiet', quiet, false);
        quietLogger.debug('hidden');
        expect(quiet.log).not.toHaveBeenCalled();
        expect(quietLogger.debugMessages).toEqual(['hidden']);

        const loud = createFacility();
        getLogger('log-loud', loud, true).debug('shown');
        expect(loud.log.mock.calls[0][0]).toContain('[DEBUG] log-loud :: shown');
    });

    it('should return the cached logger for a known name', () => {
        const first = getLogger('log-cached', NoopLogFacility);
        expect(getLogger('log-cached', createFacility(), true)).toBe(first);
        expect(first.verbose).toBe(false);
    });

    it('should build a fresh logger on every createLogger call', () => {
        const quiet = createLogger('log-fresh', NoopLogFacility);
        quiet.debug('first run');
        const loud = createFacility();
        const next = createLogger('log-fresh', loud, true);
        expect(next).not.toBe(quiet);
        expect(next.debugMessages).toEqual([]);
        next.debug('second run');
        expect(loud.log.mock.calls[0][0]).toContain('[DEBUG] log-fresh :: second run');
        expect(getLogger('log-fresh', NoopLogFacility).debugMessages).toEqual([]);
    });
});
