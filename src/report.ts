import {DateTime} from 'luxon';
import {HashMap, Option, Vector} from "prelude-ts";
import type {ReportVerbosity} from "./config";
import {escapeHtml, escapeHtmlWithBreaks} from "./html";
import {Helper} from "./helper";

export module Report {

    export interface RenderedReport {
        html: string;
        generatedOn: string; // yyyy-MM-dd
        issueCount: number;
    }

    export interface RenderOptions {
        ticketBaseURL: string;
        organizationField: string;
        verbosity: ReportVerbosity;
        title: string;
        logoURL?: string;
        now: DateTime;
    }

    export type PriorityLevel = 'urgent' | 'warning' | 'normal';

    export const noDescriptionText = 'No description provided';
    export const noOrganizationText = 'N/A';
    export const unknownOrganizationText = 'Unknown';
    export const noIssuesText = 'No unassigned issues found.';
    export const noPriorityText = 'None';
    export const unknownReporterText = 'Unknown';
    export const unknownKeyText = 'Unknown';

    const priorityLevels = HashMap.of<string, PriorityLevel>(
        ['Highest', 'urgent'],
        ['High', 'urgent'],
        ['Medium', 'warning'],
        ['Low', 'normal'],
        ['Lowest', 'normal']
    );

    // plain data for one issue section, before any markup is produced
    interface IssueView {
        key: string;
        url: string;
        summary: string;
        priorityName: string;
        priorityLevel: Option<PriorityLevel>;
        organizations: string;
        reporter: string;
        description: Option<string>;
    }

    // unknown priorities are rendered without a level class
    export function priorityLevel(priorityName: string | undefined): Option<PriorityLevel> {
        return Option.ofNullable(priorityName)
            .map(Helper.capitalize)
            .flatMap(name => priorityLevels.get(name));
    }

    function organizationName(entry: unknown): string {
        return Helper.textOf(Helper.property(entry, 'name')).getOrElse(unknownOrganizationText);
    }

    /**
     * A list of organizations is joined by ", " (entries without a name become "Unknown"),
     * a scalar is used as is, and anything else renders as "N/A".
     */
    export function organizationNames(value: unknown): string {
        if (Array.isArray(value)) {
            return value.length === 0
                ? noOrganizationText
                : Vector.ofIterable<unknown>(value).map(organizationName).mkString(', ');
        }
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            return String(value);
        }
        if (typeof value === 'object' && value !== null && 'name' in value) {
            return organizationName(value);
        }
        return noOrganizationText;
    }

    // records come straight from the tracker's JSON, so every field is read defensively
    function toIssueView(issue: JiraApi.Issue, options: RenderOptions): IssueView {
        const fields = Helper.property(issue, 'fields');
        const key = Helper.textOf(Helper.property(issue, 'key')).getOrElse(unknownKeyText);
        const priorityName = Helper.textOf(Helper.property(Helper.property(fields, 'priority'), 'name'));
        return {
            key: key,
            url: `${Helper.trimTrailingSlashes(options.ticketBaseURL)}/${encodeURIComponent(key)}`,
            summary: Helper.textOf(Helper.property(fields, 'summary')).getOrElse(''),
            priorityName: priorityName.getOrElse(noPriorityText),
            priorityLevel: priorityLevel(priorityName.getOrUndefined()),
            organizations: organizationNames(Helper.property(fields, options.organizationField)),
            reporter: Helper.textOf(Helper.property(Helper.property(fields, 'reporter'), 'displayName')).getOrElse(unknownReporterText),
            description: Helper.textOf(Helper.property(fields, 'description'))
        };
    }

    function classes(...names: Array<string | undefined>): string {
        return names.filter(x => x !== undefined).join(' ');
    }

    function renderIssue(view: IssueView, verbosity: ReportVerbosity): string {
        const level = view.priorityLevel.getOrUndefined();
        const lines = [
            `<div class="issue">`,
            `<div class="issue-header"><a class="${classes('issue-link', level)}" href="${escapeHtml(view.url)}" target="_blank">${escapeHtml(view.key)}</a> - ${escapeHtml(view.summary)}</div>`,
            `<table class="issue-detail">`
        ];
        if (verbosity === 'full') {
            lines.push(`<tr><td class="label">Organization(s):</td><td class="organizations">${escapeHtml(view.organizations)}</td></tr>`);
        }
        lines.push(`<tr><td class="label">Priority:</td><td><span class="${classes('priority', level)}">${escapeHtml(view.priorityName)}</span></td></tr>`);
        if (verbosity === 'full') {
            lines.push(
                `<tr><td class="label">Reporter:</td><td class="reporter">${escapeHtml(view.reporter)}</td></tr>`,
                `</table>`,
                `<div class="description"><span class="label">Description:</span>`,
                // the placeholder is inserted as is, only real descriptions get line breaks
                `<div class="description-text">${view.description.map(escapeHtmlWithBreaks).getOrElse(noDescriptionText)}</div>`,
                `</div>`
            );
        }
        else {
            lines.push(`</table>`);
        }
        lines.push(`</div>`);
        return lines.join('\n');
    }

    const styles = [
        `body { font-family: 'Segoe UI', Tahoma, Geneva, Verdana, sans-serif; }`,
        `.header { text-align: center; margin-bottom: 40px; }`,
        `.header-logo { max-width: 90px; }`,
        `.issue { margin-bottom: 30px; padding: 15px; border-left: 5px solid #007BFF; background-color: #f9f9f9; }`,
        `.issue-header { font-weight: bold; color: #1e3f5a; font-size: 20px; margin-bottom: 10px; }`,
        `.issue-header a { color: #007BFF; text-decoration: none; }`,
        `.issue-header a.urgent { color: #DC3545; }`,
        `.issue-header a.warning { color: #B8860B; }`,
        `.issue-header a.normal { color: #28A745; }`,
        `.issue-detail, .description { margin-left: 20px; }`,
        `.priority { padding: 3px; border-radius: 4px; font-weight: normal; }`,
        `.priority.urgent { background-color: #DC3545; color: #fff; }`,
        `.priority.warning { background-color: #FFC107; color: #fff; }`,
        `.priority.normal { background-color: #28A745; color: #fff; }`,
        `.description-text { margin-top: 10px; padding-left: 20px; color: #1e3f5a; }`,
        `.label { font-weight: bold; padding-right: 30px; }`,
        `.no-issues { text-align: center; font-style: italic; }`
    ];

    function renderHeader(options: RenderOptions, generatedOn: string): string {
        const logo = Option.ofNullable(options.logoURL)
            .map(url => `<img class="header-logo" src="${escapeHtml(url)}" alt="">\n`)
            .getOrElse('');
        return `<div class="header">\n${logo}<h2>${escapeHtml(options.title)} - ${generatedOn}</h2>\n</div>`;
    }

    /**
     * Renders the issues, in the given order, into one HTML document. An empty
     * list renders the header and a "no issues" notice.
     */
    export function render(issues: ReadonlyArray<JiraApi.Issue>, options: RenderOptions): RenderedReport {
        const generatedOn = Helper.formatReportDate(options.now);
        const sections = issues.length === 0
            ? [`<p class="no-issues">${noIssuesText}</p>`]
            : Vector.ofIterable(issues)
                .map(issue => renderIssue(toIssueView(issue, options), options.verbosity))
                .toArray();

        const html = [
            `<!DOCTYPE html>`,
            `<html>`,
            `<head>`,
            `<meta charset="utf-8">`,
            `<title>${escapeHtml(options.title)} - ${generatedOn}</title>`,
            `<style>`,
            ...styles,
            `</style>`,
            `</head>`,
            `<body>`,
            renderHeader(options, generatedOn),
            ...sections,
            `</body>`,
            `</html>`
        ].join('\n');

        return {html, generatedOn, issueCount: issues.length};
    }

    export function subjectFor(report: RenderedReport, subject: string): string {
        return `${subject} - Date: ${report.generatedOn}`;
    }
}
