import type {AxiosAdapter} from 'axios';
import {DateTime} from 'luxon';
import type {Logger} from "./logger";
import type {Settings} from "./config";
import {ConfigValidator} from "./config-validator";
import {JiraConnector} from "./jira-connector";
import {Report} from "./report";
import {Notifier} from "./notifier";
import {getErrorMessage} from "./errors";

export module Pipeline {

    // one-way; a failed run stays in the stage it had reached
    export type Stage = 'unvalidated' | 'validated' | 'fetched' | 'rendered' | 'delivered';

    export interface Invocation {
        // falls back to mail.defaultRecipient when absent
        recipient?: string;
        cc: string[];
    }

    export interface Dependencies {
        logger: Logger;
        httpAdapter?: AxiosAdapter;
        openMailSession?: Notifier.MailSessionFactory;
        clock?: () => DateTime;
    }

    export interface Result {
        stage: Stage;
        settings: Settings;
        issueCount: number;
        recipient: string;
        messageId?: string;
    }

    const stageOrder: ReadonlyArray<Stage> = ['unvalidated', 'validated', 'fetched', 'rendered', 'delivered'];

    export class RunState {
        private current: Stage = 'unvalidated';

        get stage(): Stage {
            return this.current;
        }

        advance(next: Stage) {
            if (stageOrder.indexOf(next) !== stageOrder.indexOf(this.current) + 1) {
                throw new Error(`Cannot move from stage ${this.current} to ${next}`);
            }
            this.current = next;
        }
    }

    /**
     * validate -> fetch -> render -> deliver. The first failure is logged with the
     * stage it happened in and rethrown; later stages are not attempted.
     */
    export async function run(rawSettings: unknown, invocation: Invocation, dependencies: Dependencies, state = new RunState()): Promise<Result> {
        const {logger} = dependencies;
        const clock = dependencies.clock ?? (() => DateTime.local());

        try {
            const settings = ConfigValidator.validate(rawSettings, logger);
            state.advance('validated');

            const issues = await JiraConnector.fetchUnassigned(settings.tracker, {
                logger,
                organizationField: settings.report.organizationField,
                timeoutMs: settings.report.trackerTimeoutMs,
                adapter: dependencies.httpAdapter
            });
            JiraConnector.logIssues(issues, logger);
            state.advance('fetched');

            const report = Report.render(issues, {
                ticketBaseURL: settings.tracker.ticketBaseURL,
                organizationField: settings.report.organizationField,
                verbosity: settings.report.verbosity,
                title: settings.report.title,
                logoURL: settings.report.logoURL,
                now: clock()
            });
            state.advance('rendered');

            const recipient = invocation.recipient ?? settings.mail.defaultRecipient;
            const messageId = await Notifier.send({recipient, cc: invocation.cc, report}, settings.mail, {
                logger,
                subject: settings.report.subject,
                timeoutMs: settings.report.smtpTimeoutMs,
                openSession: dependencies.openMailSession
            });
            state.advance('delivered');

            logger.info(`Report with ${report.issueCount} issues delivered to ${recipient}`);
            return {stage: state.stage, settings, issueCount: report.issueCount, recipient, messageId};
        }
        catch (error) {
            logger.error(`Run aborted in stage ${state.stage}: ${getErrorMessage(error)}`);
            throw error;
        }
    }
}
