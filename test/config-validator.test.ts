import {afterEach, describe, expect, it, vi} from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {ConfigValidator} from "../src/config-validator";
import {ConfigurationError} from "../src/errors";
import {createSilentLogger} from "../src/logger";
import {validRawSettings} from "./fixtures";

function validationError(raw: unknown): ConfigurationError {
    try {
        ConfigValidator.validate(raw, createSilentLogger());
    }
    catch (error) {
        if (error instanceof ConfigurationError) {
            return error;
        }
        throw error;
    }
    throw new Error('expected validation to fail');
}

describe('ConfigValidator.validate', () => {
    it('accepts settings with every required key', () => {
        const settings = ConfigValidator.validate(validRawSettings(), createSilentLogger());

        expect(settings.tracker.serverURL).toBe('https://tracker.example.test/');
        expect(settings.mail.smtpPort).toBe(465);
        expect(settings.mail.defaultRecipient).toBe('leads@example.test');
        expect(Object.isFrozen(settings)).toBe(true);
    });

    it('accepts present values regardless of whether they are correct', () => {
        const raw = validRawSettings();
        const settings = ConfigValidator.validate({
            ...raw,
            tracker: {...raw.tracker, serverURL: 'not a url'},
            mail: {...raw.mail, smtpPort: 'seventy'}
        }, createSilentLogger());

        expect(settings.tracker.serverURL).toBe('not a url');
        expect(settings.mail.smtpPort).toBe('seventy');
    });

    it('lists every missing key, not only the first', () => {
        const raw = validRawSettings();
        const {username, password, ...tracker} = raw.tracker;
        const {smtpPort, ...mail} = raw.mail;

        const error = validationError({tracker, mail});

        expect(error.problems).toEqual([
            'Missing setting: tracker/username',
            'Missing setting: tracker/password',
            'Missing setting: mail/smtpPort'
        ]);
        expect(error.message).toBe('Configuration validation failed:\n' +
            'Missing setting: tracker/username\n' +
            'Missing setting: tracker/password\n' +
            'Missing setting: mail/smtpPort');
    });

    it('reports a missing section once instead of each of its keys', () => {
        const error = validationError({mail: validRawSettings().mail});

        expect(error.problems).toEqual(['Missing section: tracker']);
    });

    it('reports both sections when the settings are not an object', () => {
        expect(validationError(null).problems).toEqual(['Missing section: tracker', 'Missing section: mail']);
        expect(validationError([]).problems).toEqual(['Missing section: tracker', 'Missing section: mail']);
    });

    it('treats blank strings and nulls as missing', () => {
        const raw = validRawSettings();
        const error = validationError({
            tracker: {...raw.tracker, ticketBaseURL: '   '},
            mail: {...raw.mail, smtpHost: null}
        });

        expect(error.problems).toEqual([
            'Missing setting: tracker/ticketBaseURL',
            'Missing setting: mail/smtpHost'
        ]);
    });

    it('rejects objects and arrays as invalid rather than missing', () => {
        const raw = validRawSettings();
        const error = validationError({
            tracker: {...raw.tracker, username: {name: 'report-bot'}},
            mail: {...raw.mail, smtpPort: [465], smtpHost: null},
            report: {title: {text: 'Report'}}
        });

        expect(error.problems).toEqual([
            'Invalid setting: tracker/username (expected text or a number)',
            'Missing setting: mail/smtpHost',
            'Invalid setting: mail/smtpPort (expected text or a number)',
            'Invalid setting: report/title (expected text or a number)'
        ]);
    });

    it('fills report options with defaults', () => {
        const settings = ConfigValidator.validate(validRawSettings(), createSilentLogger());

        expect(settings.report).toEqual({
            verbosity: 'full',
            title: 'Unassigned Issues Report',
            subject: 'Outstanding Unassigned Tickets Report',
            logoURL: undefined,
            organizationField: 'customfield_10002',
            trackerTimeoutMs: 30000,
            smtpTimeoutMs: 30000,
            cronTime: '00 00 06 * * *'
        });
    });

    it('reads report options and rejects invalid ones together with missing keys', () => {
        const raw = validRawSettings();
        const settings = ConfigValidator.validate({
            ...raw,
            report: {verbosity: 'summary', trackerTimeoutMs: '5000', organizationField: 'customfield_10100'}
        }, createSilentLogger());
        expect(settings.report.verbosity).toBe('summary');
        expect(settings.report.trackerTimeoutMs).toBe(5000);
        expect(settings.report.organizationField).toBe('customfield_10100');

        const {password, ...tracker} = raw.tracker;
        const error = validationError({
            tracker,
            mail: raw.mail,
            report: {verbosity: 'verbose', smtpTimeoutMs: -1}
        });
        expect(error.problems).toEqual([
            'Missing setting: tracker/password',
            'Invalid setting: report/verbosity (expected one of full, summary)',
            'Invalid setting: report/smtpTimeoutMs (expected a positive number of milliseconds)'
        ]);
    });

    it('logs the start and end of validation', () => {
        const logger = createSilentLogger();
        const info = vi.spyOn(logger, 'info');

        ConfigValidator.validate(validRawSettings(), logger);

        expect(info.mock.calls.map(call => call[0])).toEqual(['Configuration Validating', 'Configuration Validated']);
    });

    it('logs the failure at error level', () => {
        const logger = createSilentLogger();
        const errorLog = vi.spyOn(logger, 'error');

        expect(() => ConfigValidator.validate({}, logger)).toThrow(ConfigurationError);
        expect(errorLog).toHaveBeenCalledWith('Configuration validation failed:\nMissing section: tracker\nMissing section: mail');
    });
});

describe('ConfigValidator.loadSettingsFile', () => {
    const tempDirs: string[] = [];

    function tempFile(content: string): string {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'unassigned-report-'));
        tempDirs.push(dir);
        const file = path.join(dir, 'config.json');
        fs.writeFileSync(file, content);
        return file;
    }

    afterEach(() => {
        tempDirs.splice(0).forEach(dir => fs.rmSync(dir, {recursive: true, force: true}));
    });

    it('parses the json file', () => {
        const file = tempFile(JSON.stringify(validRawSettings()));

        expect(ConfigValidator.loadSettingsFile(file)).toEqual(validRawSettings());
    });

    it('fails with a configuration error on invalid json', () => {
        const file = tempFile('{"tracker": ');

        expect(() => ConfigValidator.loadSettingsFile(file)).toThrow(ConfigurationError);
    });

    it('fails with a configuration error when the file does not exist', () => {
        expect(() => ConfigValidator.loadSettingsFile(path.join(os.tmpdir(), 'does-not-exist', 'config.json')))
            .toThrow(/Failed to read settings file/);
    });
});
