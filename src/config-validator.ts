import {Option, Vector} from "prelude-ts";
import * as fs from 'fs';
import type {Logger} from "./logger";
import {ConfigurationError, getErrorMessage} from "./errors";
import {defaultReportSettings, MailSettings, ReportSettings, ReportVerbosity, Settings, TrackerSettings} from "./config";

export module ConfigValidator {

    export const requiredTrackerKeys: ReadonlyArray<keyof TrackerSettings> =
        ['serverURL', 'ticketBaseURL', 'username', 'password'];

    export const requiredMailKeys: ReadonlyArray<keyof MailSettings> =
        ['senderAddress', 'smtpHost', 'smtpPort', 'smtpUsername', 'smtpPassword', 'defaultRecipient'];

    const verbosities: ReadonlyArray<ReportVerbosity> = ['full', 'summary'];

    const reportKeys: ReadonlyArray<keyof ReportSettings> =
        ['verbosity', 'title', 'subject', 'logoURL', 'organizationField', 'trackerTimeoutMs', 'smtpTimeoutMs', 'cronTime'];

    type Section = Record<string, unknown>;
    type SettingValue = string | number;

    export function loadSettingsFile(filePath: string): unknown {
        let content: string;
        try {
            content = fs.readFileSync(filePath, 'utf8');
        }
        catch (error) {
            throw new ConfigurationError(`Failed to read settings file '${filePath}': ${getErrorMessage(error)}`, [], error);
        }
        try {
            return JSON.parse(content);
        }
        catch (error) {
            throw new ConfigurationError(`Settings file '${filePath}' is not valid JSON: ${getErrorMessage(error)}`, [], error);
        }
    }

    function asSection(value: unknown): Option<Section> {
        if (typeof value !== 'object' || value === null || Array.isArray(value)) {
            return Option.none();
        }
        return Option.of(Object.fromEntries(Object.entries(value)));
    }

    // null and blank strings count as absent; objects are rejected by checkKey
    function readValue(section: Section, key: string): Option<SettingValue> {
        const value = section[key];
        if (typeof value === 'number') {
            return Option.of<SettingValue>(value);
        }
        if (typeof value === 'boolean') {
            return Option.of<SettingValue>(String(value));
        }
        return Option.ofNullable<SettingValue>(typeof value === 'string' ? value : undefined)
            .filter(x => String(x).trim().length > 0);
    }

    // present, but neither text nor a number, e.g. {"smtpHost": {"name": "x"}}
    function isStructured(value: unknown): boolean {
        return typeof value === 'object' && value !== null;
    }

    function invalidValue(sectionName: string, key: string): string {
        return `Invalid setting: ${sectionName}/${key} (expected text or a number)`;
    }

    function checkKey(section: Section, sectionName: string, key: string): Option<string> {
        if (isStructured(section[key])) {
            return Option.of(invalidValue(sectionName, key));
        }
        return readValue(section, key).isNone()
            ? Option.of(`Missing setting: ${sectionName}/${key}`)
            : Option.none();
    }

    function readString(section: Section, key: string): Option<string> {
        return readValue(section, key).map(x => String(x));
    }

    interface SectionCheck {
        section: Option<Section>;
        problems: Vector<string>;
    }

    function checkSection(raw: Section, sectionName: string, keys: ReadonlyArray<string>): SectionCheck {
        const section = asSection(raw[sectionName]);
        if (section.isNone()) {
            return {section, problems: Vector.of(`Missing section: ${sectionName}`)};
        }
        const present = section.getOrThrow();
        const problems = Vector.ofIterable(keys)
            .flatMap(key => checkKey(present, sectionName, key).toVector());
        return {section, problems};
    }

    function readReportSettings(raw: Section): [ReportSettings, Vector<string>] {
        const section = asSection(raw['report']).getOrElse({});
        let problems = Vector.ofIterable(reportKeys)
            .filter(key => isStructured(section[key]))
            .map(key => invalidValue('report', key));

        const verbosityValue = readString(section, 'verbosity');
        const verbosity = verbosityValue.flatMap(x => Option.ofNullable(verbosities.find(v => v === x)));
        if (verbosityValue.isSome() && verbosity.isNone()) {
            problems = problems.append(`Invalid setting: report/verbosity (expected one of ${verbosities.join(', ')})`);
        }

        const readTimeout = (key: 'trackerTimeoutMs' | 'smtpTimeoutMs'): number => {
            const value = readValue(section, key);
            const timeout = value.map(x => Number(x)).filter(x => Number.isFinite(x) && x > 0);
            if (value.isSome() && timeout.isNone()) {
                problems = problems.append(`Invalid setting: report/${key} (expected a positive number of milliseconds)`);
            }
            return timeout.getOrElse(defaultReportSettings[key]);
        };

        const settings: ReportSettings = {
            verbosity: verbosity.getOrElse(defaultReportSettings.verbosity),
            title: readString(section, 'title').getOrElse(defaultReportSettings.title),
            subject: readString(section, 'subject').getOrElse(defaultReportSettings.subject),
            logoURL: readString(section, 'logoURL').getOrUndefined(),
            organizationField: readString(section, 'organizationField').getOrElse(defaultReportSettings.organizationField),
            trackerTimeoutMs: readTimeout('trackerTimeoutMs'),
            smtpTimeoutMs: readTimeout('smtpTimeoutMs'),
            cronTime: readString(section, 'cronTime').getOrElse(defaultReportSettings.cronTime)
        };
        return [settings, problems];
    }

    /**
     * Checks that every required section and setting is present. All problems are
     * collected and reported in a single ConfigurationError.
     */
    export function validate(rawSettings: unknown, logger: Logger): Settings {
        logger.info("Configuration Validating");

        const raw = asSection(rawSettings).getOrElse({});
        const tracker = checkSection(raw, 'tracker', requiredTrackerKeys);
        const mail = checkSection(raw, 'mail', requiredMailKeys);
        const [report, reportProblems] = readReportSettings(raw);

        const problems = tracker.problems
            .appendAll(mail.problems)
            .appendAll(reportProblems);

        if (!problems.isEmpty()) {
            const errorMessage = "Configuration validation failed:\n" + problems.mkString("\n");
            logger.error(errorMessage);
            throw new ConfigurationError(errorMessage, problems.toArray());
        }

        const trackerSection = tracker.section.getOrThrow();
        const mailSection = mail.section.getOrThrow();
        const required = (section: Section, key: string): string => readString(section, key).getOrThrow();

        const settings: Settings = {
            tracker: {
                serverURL: required(trackerSection, 'serverURL'),
                ticketBaseURL: required(trackerSection, 'ticketBaseURL'),
                username: required(trackerSection, 'username'),
                password: required(trackerSection, 'password')
            },
            mail: {
                senderAddress: required(mailSection, 'senderAddress'),
                smtpHost: required(mailSection, 'smtpHost'),
                smtpPort: readValue(mailSection, 'smtpPort').getOrThrow(),
                smtpUsername: required(mailSection, 'smtpUsername'),
                smtpPassword: required(mailSection, 'smtpPassword'),
                defaultRecipient: required(mailSection, 'defaultRecipient')
            },
            report: report
        };

        logger.info("Configuration Validated");
        return Object.freeze(settings);
    }
}
