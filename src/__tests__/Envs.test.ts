/**
 * Environment configuration – unit tests
 */
import { loadConfig } from '../config/envs';

describe('loadConfig', () => {
    it('applies defaults to an empty environment', () => {
        expect(loadConfig({})).toEqual({
            invoicesDir: 'invoices',
            workbookPath: 'data/invoices.db',
            logFile: 'log.txt',
            logLevel: 'info',
            debugTextDir: undefined,
        });
    });

    it('reads every variable', () => {
        const config = loadConfig({
            INVOICES_DIR: '/srv/inbox',
            WORKBOOK_PATH: '/srv/ledger.db',
            LOG_FILE: '/var/log/ledger.txt',
            LOG_LEVEL: 'debug',
            DEBUG_TEXT_DIR: '/tmp/text',
            UNRELATED: 'ignored',
        });

        expect(config).toEqual({
            invoicesDir: '/srv/inbox',
            workbookPath: '/srv/ledger.db',
            logFile: '/var/log/ledger.txt',
            logLevel: 'debug',
            debugTextDir: '/tmp/text',
        });
    });

    it('does not load .env when the library is imported', () => {
        const dotenvLoaded = jest.fn();
        jest.isolateModules(() => {
            jest.doMock('dotenv/config', () => {
                dotenvLoaded();
                return {};
            });
            require('../index');
        });
        expect(dotenvLoaded).not.toHaveBeenCalled();
    });

    it('rejects an unknown log level', () => {
        expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(
            /^Config validation error: "LOG_LEVEL" must be one of/
        );
    });
});
