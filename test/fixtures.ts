import {AxiosError} from 'axios';
import type {AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig} from 'axios';
import {EventEmitter} from 'events';
import type {Notifier} from "../src/notifier";
import {JiraConnector} from "../src/jira-connector";
import {createSilentLogger} from "../src/logger";

export function validRawSettings() {
    return {
        tracker: {
            serverURL: 'https://tracker.example.test/',
            ticketBaseURL: 'https://tracker.example.test/browse',
            username: 'report-bot',
            password: 'test-secret'
        },
        mail: {
            senderAddress: 'reports@example.test',
            smtpHost: 'smtp.example.test',
            smtpPort: 465,
            smtpUsername: 'reports@example.test',
            smtpPassword: 'test-secret',
            defaultRecipient: 'leads@example.test'
        }
    };
}

export function issue(key: string, fields: JiraApi.IssueFields): JiraApi.Issue {
    return {key, fields};
}

// a High issue with two organizations and a Medium one without the organization field
export function sampleIssues(): JiraApi.Issue[] {
    return [
        issue('PROJ-2', {
            summary: 'Checkout page times out',
            priority: {name: 'High'},
            reporter: {displayName: 'Alex Reporter'},
            customfield_10002: [{name: 'OrgA'}, {name: 'OrgB'}],
            description: 'Steps:\nopen checkout'
        }),
        issue('PROJ-1', {
            summary: 'Typo on the login screen',
            priority: {name: 'Medium'},
            reporter: {displayName: 'Sam Reporter'},
            description: null
        })
    ];
}

// runs a raw search body through the connector, the way tracker records reach the report
export function fetchedIssues(body: unknown): Promise<JiraApi.Issue[]> {
    return JiraConnector.fetchUnassigned({
        serverURL: 'https://tracker.example.test',
        ticketBaseURL: 'https://tracker.example.test/browse',
        username: 'report-bot',
        password: 'test-secret'
    }, {
        logger: createSilentLogger(),
        organizationField: 'customfield_10002',
        timeoutMs: 1000,
        adapter: trackerAdapter(200, body)
    });
}

// a record without fields and one whose text fields arrive as numbers
export function malformedSearchBody() {
    return {
        issues: [
            {key: 'OPS-1'},
            {key: 'OPS-2', fields: {summary: 123, priority: {name: 3}, reporter: {displayName: 7}}}
        ]
    };
}

export interface RecordedRequest {
    config: InternalAxiosRequestConfig;
}

/**
 * In-process stand-in for the tracker: records each request and answers with
 * the given status and body.
 */
export function trackerAdapter(status: number, body: unknown, requests: RecordedRequest[] = []): AxiosAdapter {
    return async (config: InternalAxiosRequestConfig) => {
        requests.push({config});
        const response: AxiosResponse = {
            data: body,
            status: status,
            statusText: status === 200 ? 'OK' : status === 401 ? 'Unauthorized' : 'Error',
            headers: {},
            config: config
        };
        if (status >= 200 && status < 300) {
            return response;
        }
        throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_REQUEST, config, null, response);
    };
}

export function failingAdapter(message: string): AxiosAdapter {
    return async (config: InternalAxiosRequestConfig) => {
        throw new AxiosError(message, 'ECONNREFUSED', config);
    };
}

export class FakeMailSession implements Notifier.MailSession {
    public loggedIn = false;
    public open = true;
    public closeCalls = 0;
    public sent: Notifier.MailMessage[] = [];

    constructor(private readonly failOn?: 'login' | 'send') {
    }

    async login(): Promise<void> {
        if (this.failOn === 'login') {
            throw new Error('535 Authentication failed');
        }
        this.loggedIn = true;
    }

    async send(message: Notifier.MailMessage): Promise<string | undefined> {
        if (this.failOn === 'send') {
            throw new Error('Connection closed unexpectedly');
        }
        this.sent.push(message);
        return `<message-${this.sent.length}@example.test>`;
    }

    close(): void {
        this.closeCalls += 1;
        this.open = false;
    }
}

export function sessionFactory(session: FakeMailSession): Notifier.MailSessionFactory {
    return () => session;
}

export interface SentEnvelope {
    envelope: Notifier.SmtpEnvelope;
    message: string;
}

/**
 * In-process stand-in for an SMTP connection. A connect failure is emitted as
 * an 'error' event, the others are passed to the callback.
 */
export class FakeSmtpConnection extends EventEmitter implements Notifier.SmtpConnection {
    public credentials: Notifier.SmtpCredentials | undefined;
    public sent: SentEnvelope[] = [];
    public quitCalls = 0;
    public closeCalls = 0;

    constructor(private readonly failOn?: 'connect' | 'login' | 'send') {
        super();
    }

    connect(callback: (error?: Error) => void): void {
        if (this.failOn === 'connect') {
            this.emit('error', new Error('connect ECONNREFUSED 127.0.0.1:465'));
            return;
        }
        callback();
    }

    login(auth: Notifier.SmtpCredentials, callback: (error?: Error) => void): void {
        this.credentials = auth;
        callback(this.failOn === 'login' ? new Error('535 Authentication failed') : undefined);
    }

    send(envelope: Notifier.SmtpEnvelope, message: Buffer, callback: (error: Error | null) => void): void {
        if (this.failOn === 'send') {
            callback(new Error('452 Insufficient system storage'));
            return;
        }
        this.sent.push({envelope, message: message.toString('utf8')});
        callback(null);
    }

    quit(): void {
        this.quitCalls += 1;
    }

    close(): void {
        this.closeCalls += 1;
    }
}
