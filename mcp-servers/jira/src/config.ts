import { ConfigurationError, getEnv, getEnvList, type JiraConfig } from '@review-tracker/shared';
import { DEFAULT_CONCURRENCY } from './services/ticket-analysis.service.js';
import { DEFAULT_BLOCKED_STAGES, DEFAULT_WORKFLOW_STAGES, WorkflowModel } from './workflow/workflow-model.js';

export interface ServerConfig {
  jira: JiraConfig;
  workflow: WorkflowModel;
  concurrency: number;
}

/**
 * Read server configuration from the environment.
 * Missing Jira credentials are reported together in one ConfigurationError.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const jira: JiraConfig = {
    baseUrl: getEnv('JIRA_BASE_URL', '', env).replace(/\/+$/, ''),
    email: getEnv('JIRA_EMAIL', '', env),
    apiToken: getEnv('JIRA_API_TOKEN', '', env),
  };

  const missing = [
    ['JIRA_BASE_URL', jira.baseUrl],
    ['JIRA_EMAIL', jira.email],
    ['JIRA_API_TOKEN', jira.apiToken],
  ].filter(([, value]) => !value).map(([name]) => name);

  if (missing.length > 0) {
    throw new ConfigurationError(`Missing Jira configuration: ${missing.join(', ')}`);
  }

  const workflow = new WorkflowModel(
    getEnvList('WORKFLOW_STAGES', [...DEFAULT_WORKFLOW_STAGES], env),
    getEnvList('WORKFLOW_BLOCKED_STATES', [...DEFAULT_BLOCKED_STAGES], env)
  );

  const concurrencyText = getEnv('ANALYSIS_CONCURRENCY', String(DEFAULT_CONCURRENCY), env);
  const concurrency = Number(concurrencyText);
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError(`ANALYSIS_CONCURRENCY must be a positive integer, got "${concurrencyText}"`);
  }

  return { jira, workflow, concurrency };
}
