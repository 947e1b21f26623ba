import axios, {AxiosAdapter, AxiosInstance} from 'axios';
import Table from 'cli-table3';
import * as os from 'os';
import {Vector} from "prelude-ts";
import type {Logger} from "./logger";
import type {TrackerSettings} from "./config";
import {getErrorMessage, RetrievalError} from "./errors";
import {Helper} from "./helper";

export module JiraConnector {

    export const searchPath = '/rest/api/2/search';

    export const unassignedIssuesJql = 'assignee = EMPTY AND status != "Closed" AND ' +
        'status != "Resolved" AND status != "Done" ORDER BY created DESC';

    // assignee, created, updated and status are not rendered; they keep the payload self-describing
    export function fieldProjection(organizationField: string): string {
        return ['key', 'summary', 'assignee', 'reporter', 'created', 'updated', 'priority',
            organizationField, 'description', 'status'].join(',');
    }

    export interface FetchOptions {
        logger: Logger;
        organizationField: string;
        timeoutMs: number;
        // replaces the network layer, e.g. with an in-process fake
        adapter?: AxiosAdapter;
    }

    export function createClient(settings: TrackerSettings, timeoutMs: number, adapter?: AxiosAdapter): AxiosInstance {
        return axios.create({
            baseURL: Helper.trimTrailingSlashes(settings.serverURL),
            auth: {
                username: settings.username,
                password: settings.password
            },
            headers: {
                Accept: 'application/json'
            },
            timeout: timeoutMs,
            adapter: adapter
        });
    }

    function isSearchResponse(data: unknown): data is JiraApi.SearchResponse {
        return typeof data === 'object' && data !== null && 'issues' in data && Array.isArray(data.issues);
    }

    /**
     * Runs the single unassigned-issues query and returns the issues in the
     * order the tracker sent them (newest first). Errors are logged and rethrown.
     */
    export async function fetchUnassigned(settings: TrackerSettings, options: FetchOptions): Promise<JiraApi.Issue[]> {
        const {logger} = options;
        logger.info("JIRA API Unassigned Ticket Request");

        const client = createClient(settings, options.timeoutMs, options.adapter);
        const params: JiraApi.SearchParams = {
            jql: unassignedIssuesJql,
            fields: fieldProjection(options.organizationField)
        };

        let data: unknown;
        try {
            const response = await client.get<unknown>(searchPath, {params});
            data = response.data;
        }
        catch (error) {
            if (axios.isAxiosError(error) && error.response !== undefined) {
                const {status, statusText} = error.response;
                const errorMsg = `HTTP error occurred: ${status} ${statusText} for url ${Helper.trimTrailingSlashes(settings.serverURL)}${searchPath}`;
                logger.error(errorMsg);
                throw new RetrievalError(errorMsg, 'http', status, error);
            }
            const errorMsg = `An error occurred while querying the tracker: ${getErrorMessage(error)}`;
            logger.error(errorMsg);
            throw new RetrievalError(errorMsg, 'transport', undefined, error);
        }

        if (!isSearchResponse(data)) {
            const errorMsg = `An error occurred while querying the tracker: response has no 'issues' array`;
            logger.error(errorMsg);
            throw new RetrievalError(errorMsg, 'transport');
        }

        logger.info(`Fetched ${data.issues.length} unassigned issues`);
        return data.issues;
    }

    // fields are read the same way the report reads them; a record without `fields` logs blank cells
    function cell(record: unknown, ...path: string[]): string {
        return Helper.textOf(path.reduce(Helper.property, record)).getOrElse('');
    }

    export function logIssues(issues: ReadonlyArray<JiraApi.Issue>, logger: Logger) {
        if (issues.length === 0) {
            return;
        }
        const issueTable = new Table({
            head: ['key', 'priority', 'reporter', 'summary'],
            colWidths: [14, 10, 24, 80],
            style: {
                compact: true,
                head: [],    //disable colors in header cells
                border: []  //disable colors for the border
            },
            wordWrap: true
        });

        issueTable.push(...Vector.ofIterable(issues)
            .map(x => [
                cell(x, 'key'),
                cell(x, 'fields', 'priority', 'name'),
                cell(x, 'fields', 'reporter', 'displayName'),
                cell(x, 'fields', 'summary')
            ])
            .toArray());

        logger.info("Unassigned issues:");
        logger.info(os.EOL + issueTable.toString());
    }
}
