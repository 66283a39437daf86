export { datadogTools, expandErrorQuery, DATADOG_CATEGORY } from './datadog.js';
export type { LogEntry, MonitorSummary } from './datadog.js';
export { jiraTools, documentToText, atlassianClientOptions, JIRA_CATEGORY } from './jira.js';
export type { IssueSummary } from './jira.js';
export { confluenceTools, storageToText, CONFLUENCE_CATEGORY } from './confluence.js';
export type { PageSummary, SpaceSummary } from './confluence.js';
export { githubTools, GITHUB_CATEGORY } from './github.js';
export type { IssueItem } from './github.js';
