import { loadConfig } from '../src/config.js';
import { LogicException } from '../src/types/errors.js';
import { createLogger, getLogLevel, setLogLevel } from '../src/utils/logger.js';

describe('loadConfig', () => {
    test('uses defaults for an empty environment', () => {
        expect(loadConfig({})).toEqual({ format: 'tptp', ffpcnf: false, logLevel: 'warn' });
    });

    test('reads every variable', () => {
        expect(loadConfig({ CLIF_FORMAT: 'ladr', CLIF_FFPCNF: 'true', CLIF_LOG_LEVEL: 'debug' }))
            .toEqual({ format: 'ladr', ffpcnf: true, logLevel: 'debug' });
    });

    test('accepts 1 and 0 as flags', () => {
        expect(loadConfig({ CLIF_FFPCNF: '1' }).ffpcnf).toBe(true);
        expect(loadConfig({ CLIF_FFPCNF: '0' }).ffpcnf).toBe(false);
    });

    test('treats empty strings as unset', () => {
        expect(loadConfig({ CLIF_FORMAT: '', CLIF_FFPCNF: '' })).toEqual({ format: 'tptp', ffpcnf: false, logLevel: 'warn' });
    });

    test('rejects an unknown format', () => {
        let caught: unknown;
        try {
            loadConfig({ CLIF_FORMAT: 'smtlib' });
        } catch (e) {
            caught = e;
        }
        expect(caught).toBeInstanceOf(LogicException);
        if (caught instanceof LogicException) {
            expect(caught.code).toBe('CONFIG_ERROR');
            expect(caught.message).toMatch(/^Invalid configuration: CLIF_FORMAT: /);
        }
    });

    test('rejects a malformed flag', () => {
        expect(() => loadConfig({ CLIF_FFPCNF: 'yes' })).toThrow(/CLIF_FFPCNF/);
    });
});

describe('logger', () => {
    afterEach(() => {
        setLogLevel('warn');
    });

    test('writes messages at or above the current level to stderr', () => {
        const stderr = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const logger = createLogger('test');

        setLogLevel('info');
        logger.debug('hidden');
        logger.info('shown', { axioms: 2 });
        logger.error('also shown');

        expect(stderr.mock.calls).toEqual([
            ['[info] test: shown', { axioms: 2 }],
            ['[error] test: also shown'],
        ]);
        stderr.mockRestore();
    });

    test('silent suppresses everything', () => {
        const stderr = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        setLogLevel('silent');
        createLogger('test').error('nothing');
        expect(stderr).not.toHaveBeenCalled();
        stderr.mockRestore();
    });

    test('reports the current level', () => {
        setLogLevel('debug');
        expect(getLogLevel()).toBe('debug');
    });
});
