import { afterEach, describe, expect, it, vi } from 'vitest';
import { createConsoleLogger } from './console-logger.js';

const fixedNow = () => new Date('2024-03-01T12:00:00.000Z');

describe('createConsoleLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should prefix messages with timestamp and level', () => {
        const info = vi.spyOn(console, 'info').mockImplementation(() => {});

        createConsoleLogger('info', fixedNow).info?.('Found 2 chapter files', { ignored: 1 });

        expect(info).toHaveBeenCalledWith('2024-03-01T12:00:00.000Z [INFO] Found 2 chapter files', { ignored: 1 });
    });

    it('should send warnings and errors to their console methods', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const logger = createConsoleLogger('info', fixedNow);

        logger.warn?.('No verses found in REV22.htm');
        logger.error?.('Error reading EXO01.htm');

        expect(warn).toHaveBeenCalledWith('2024-03-01T12:00:00.000Z [WARN] No verses found in REV22.htm');
        expect(error).toHaveBeenCalledWith('2024-03-01T12:00:00.000Z [ERROR] Error reading EXO01.htm');
    });

    it('should drop messages above the configured level', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        const logger = createConsoleLogger('info', fixedNow);

        logger.debug?.('hidden');
        logger.trace?.('hidden');

        expect(log).not.toHaveBeenCalled();
    });

    it('should print debug output at debug level', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});

        createConsoleLogger('debug', fixedNow).debug?.('Sample verse');

        expect(log).toHaveBeenCalledWith('2024-03-01T12:00:00.000Z [DEBUG] Sample verse');
    });
});
