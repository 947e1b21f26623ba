import MimeNode from 'nodemailer/lib/mime-node';
import SMTPConnection from 'nodemailer/lib/smtp-connection';
import type {Logger} from "./logger";
import type {MailSettings} from "./config";
import {DeliveryError, getErrorMessage} from "./errors";
import {Report} from "./report";

export module Notifier {

    export interface NotificationRequest {
        recipient: string;
        cc: string[];
        report: Report.RenderedReport;
    }

    export interface MailMessage {
        from: string;
        to: string;
        cc?: string;
        subject: string;
        html: string;
    }

    /**
     * One authenticated mail session. `close` must be safe to call after a
     * failed `login`.
     */
    export interface MailSession {
        login(): Promise<void>;
        send(message: MailMessage): Promise<string | undefined>;
        close(): void;
    }

    export type MailSessionFactory = (settings: MailSettings, timeoutMs: number) => MailSession;

    export interface SendOptions {
        logger: Logger;
        subject: string;
        timeoutMs: number;
        openSession?: MailSessionFactory;
    }

    export interface SmtpCredentials {
        credentials: {
            user: string;
            pass: string;
        };
    }

    export interface SmtpEnvelope {
        from: string | false;
        to: string[];
    }

    // the part of nodemailer's SMTPConnection a session needs
    export interface SmtpConnection {
        connect(callback: (error?: Error) => void): void;
        login(auth: SmtpCredentials, callback: (error?: Error) => void): void;
        send(envelope: SmtpEnvelope, message: Buffer, callback: (error: Error | null) => void): void;
        quit(): void;
        close(): void;
        on(event: 'error', listener: (error: Error) => void): unknown;
    }

    // one multipart/related message with the report as its html part
    export function buildMimeMessage(message: MailMessage): MimeNode {
        const root = new MimeNode('multipart/related');
        root.setHeader('From', message.from);
        root.setHeader('To', message.to);
        if (message.cc !== undefined) {
            root.setHeader('Cc', message.cc);
        }
        root.setHeader('Subject', message.subject);
        root.createChild('text/html; charset=utf-8').setContent(message.html);
        return root;
    }

    function buildRaw(root: MimeNode): Promise<Buffer> {
        return new Promise((resolve, reject) => {
            root.build((error, raw) => error ? reject(error) : resolve(raw));
        });
    }

    /**
     * A session over a single SMTP connection: `login` connects and
     * authenticates, `send` transmits on the same connection and `close` quits
     * it, or drops it after a connection error. Connection errors arrive as
     * 'error' events and fail the step in progress.
     */
    export function smtpSession(connection: SmtpConnection, settings: MailSettings): MailSession {
        let connected = false;
        let failure: Error | undefined;
        let pending: ((error: Error) => void) | undefined;

        connection.on('error', error => {
            failure = error;
            pending?.(error);
        });

        function step(run: (done: (error?: Error | null) => void) => void): Promise<void> {
            if (failure !== undefined) {
                return Promise.reject(failure);
            }
            return new Promise((resolve, reject) => {
                pending = reject;
                run(error => {
                    pending = undefined;
                    if (error) {
                        reject(error);
                    }
                    else {
                        resolve();
                    }
                });
            });
        }

        return {
            login: async () => {
                await step(done => connection.connect(done));
                connected = true;
                await step(done => connection.login({
                    credentials: {
                        user: settings.smtpUsername,
                        pass: settings.smtpPassword
                    }
                }, done));
            },
            send: async message => {
                const root = buildMimeMessage(message);
                const raw = await buildRaw(root);
                await step(done => connection.send(root.getEnvelope(), raw, done));
                return root.messageId();
            },
            close: () => {
                if (connected && failure === undefined) {
                    connection.quit();
                }
                else {
                    connection.close();
                }
            }
        };
    }

    // implicit TLS, e.g. port 465
    export const createSmtpSession: MailSessionFactory = (settings, timeoutMs) => smtpSession(new SMTPConnection({
        host: settings.smtpHost,
        port: Number(settings.smtpPort),
        secure: true,
        connectionTimeout: timeoutMs,
        greetingTimeout: timeoutMs,
        socketTimeout: timeoutMs
    }), settings);

    export function composeMessage(request: NotificationRequest, settings: MailSettings, subject: string): MailMessage {
        const message: MailMessage = {
            from: settings.senderAddress,
            to: request.recipient,
            subject: Report.subjectFor(request.report, subject),
            html: request.report.html
        };
        if (request.cc.length > 0) {
            message.cc = request.cc.join(', ');
        }
        return message;
    }

    /**
     * Sends the report once. The session is closed on every path; any failure is
     * logged and rethrown as a DeliveryError.
     */
    export async function send(request: NotificationRequest, settings: MailSettings, options: SendOptions): Promise<string | undefined> {
        const {logger} = options;
        const message = composeMessage(request, settings, options.subject);
        const openSession = options.openSession ?? createSmtpSession;

        logger.info(`Sending email '${message.subject}' to ${message.to}` + (message.cc !== undefined ? `, cc ${message.cc}` : ''));
        let session: MailSession | undefined;
        try {
            session = openSession(settings, options.timeoutMs);
            await session.login();
            const messageId = await session.send(message);
            logger.info(`Message sent: ${messageId ?? 'no message id'}`);
            return messageId;
        }
        catch (error) {
            const errorMsg = `Failed to send mail to ${message.to}, message: ${getErrorMessage(error)}`;
            logger.error(errorMsg);
            throw new DeliveryError(errorMsg, error);
        }
        finally {
            session?.close();
        }
    }
}
