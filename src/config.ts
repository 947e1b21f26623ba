export interface TrackerSettings {
    serverURL: string;
    ticketBaseURL: string; // issue links are <ticketBaseURL>/<key>
    username: string;
    password: string;
}

export interface MailSettings {
    senderAddress: string; // e.g. '"Unassigned report" <reports@somedomain.com>'
    smtpHost: string;
    smtpPort: number | string;
    smtpUsername: string;
    smtpPassword: string;
    defaultRecipient: string;
}

export type ReportVerbosity = 'full' | 'summary';

export interface ReportSettings {
    verbosity: ReportVerbosity;
    title: string;
    subject: string;
    logoURL?: string;
    organizationField: string;
    trackerTimeoutMs: number;
    smtpTimeoutMs: number;
    cronTime: string;
}

export interface Settings {
    readonly tracker: Readonly<TrackerSettings>;
    readonly mail: Readonly<MailSettings>;
    readonly report: Readonly<ReportSettings>;
}

export const defaultReportSettings: Readonly<ReportSettings> = {
    verbosity: 'full',
    title: 'Unassigned Issues Report',
    subject: 'Outstanding Unassigned Tickets Report',
    organizationField: 'customfield_10002',
    trackerTimeoutMs: 30000,
    smtpTimeoutMs: 30000,
    cronTime: '00 00 06 * * *'
};
