// partial definitions for the Jira REST api v2 search endpoint
// https://developer.atlassian.com/cloud/jira/platform/rest/v2/api-group-issue-search/
declare module JiraApi {

    interface SearchParams {
        jql: string;
        fields: string; // comma separated field projection
    }

    interface SearchResponse {
        startAt?: number;
        maxResults?: number;
        total?: number;
        issues: Issue[];
    }

    // =========== ISSUE ===========
    interface User {
        displayName?: string;
        emailAddress?: string;
        accountId?: string;
    }

    interface Priority {
        id?: string;
        name?: string; // Highest, High, Medium, Low, Lowest or tracker specific values
    }

    interface Status {
        id?: string;
        name?: string;
    }

    // service desk organizations (customfield_10002 on most instances)
    interface Organization {
        id?: string;
        name?: string;
    }

    interface IssueFields {
        summary?: string;
        assignee?: User | null;
        reporter?: User | null;
        created?: string; // ISO 8601
        updated?: string; // ISO 8601
        priority?: Priority | null;
        description?: string | null;
        status?: Status | null;
        // custom fields, e.g. the organization field, are addressed by their id
        [customField: string]: unknown;
    }

    interface Issue {
        id?: string;
        key: string;
        self?: string;
        fields: IssueFields;
    }
}
