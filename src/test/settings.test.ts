import * as assert from 'assert';
import { getDefaultSettings, getSetting, getSettings, parseBoolean, SettingsWarning } from '../settings';
import { Logger, formatContext, getLogger, disposeLogger, initializeLogger } from '../logger';
import { MemorySink } from './helpers';

suite('Settings Test Suite', () => {
    test('should use defaults for an empty environment', () => {
        assert.deepStrictEqual(getSettings({}), {
            timeout: 30000,
            followRedirects: true,
            maxRedirects: 10,
            rejectUnauthorized: false,
            saveResponses: true,
            logLevel: 'info',
        });
    });

    test('should read overrides from the environment', () => {
        const settings = getSettings({
            REQFILE_TIMEOUT: '5000',
            REQFILE_FOLLOW_REDIRECTS: 'no',
            REQFILE_SAVE_RESPONSES: '0',
            REQFILE_LOG_LEVEL: 'DEBUG',
        });
        assert.strictEqual(settings.timeout, 5000);
        assert.strictEqual(settings.followRedirects, false);
        assert.strictEqual(settings.saveResponses, false);
        assert.strictEqual(settings.logLevel, 'debug');
    });

    test('should fall back and warn on unusable values', () => {
        const warnings: SettingsWarning[] = [];
        const settings = getSettings({ REQFILE_MAX_REDIRECTS: 'lots', REQFILE_LOG_LEVEL: 'loud', REQFILE_TIMEOUT: ' ' }, warnings);

        assert.strictEqual(settings.maxRedirects, 10);
        assert.strictEqual(settings.logLevel, 'info');
        assert.strictEqual(settings.timeout, 30000);
        assert.deepStrictEqual(warnings, [
            { variable: 'REQFILE_MAX_REDIRECTS', value: 'lots' },
            { variable: 'REQFILE_LOG_LEVEL', value: 'loud' },
        ]);
    });

    test('should read a single setting', () => {
        assert.strictEqual(getSetting('rejectUnauthorized', { REQFILE_REJECT_UNAUTHORIZED: 'true' }), true);
    });

    test('should hand out independent copies of the defaults', () => {
        const defaults = getDefaultSettings();
        defaults.timeout = 1;
        assert.strictEqual(getDefaultSettings().timeout, 30000);
    });

    test('should parse boolean spellings', () => {
        assert.deepStrictEqual(['1', 'On', 'YES', 'off', 'False', 'maybe'].map(parseBoolean), [true, true, true, false, false, undefined]);
    });
});

suite('Logger Test Suite', () => {
    teardown(() => {
        disposeLogger();
    });

    test('should throw before initialization', () => {
        disposeLogger();
        assert.throws(() => getLogger(), /Logger not initialized\. Call initializeLogger first\./);
    });

    test('should drop messages below the level', () => {
        const sink = new MemorySink();
        const logger = new Logger({ level: 'warn', sink, color: false });
        logger.info('hidden');
        logger.warn('careful', { count: 2 });
        assert.deepStrictEqual(sink.lines, ['WARN  careful count=2']);
    });

    test('should write nothing when off', () => {
        const sink = new MemorySink();
        const logger = initializeLogger({ level: 'off', sink, color: false });
        logger.error('hidden');
        assert.strictEqual(sink.text, '');
        assert.strictEqual(getLogger(), logger);
    });

    test('should quote context values that contain whitespace', () => {
        assert.strictEqual(
            formatContext({ file: 'a b.http', line: 3, ok: true, error: new Error('bad thing') }),
            'file="a b.http" line=3 ok=true error="bad thing"'
        );
    });
});
