import axios, { type AxiosInstance } from 'axios';
import { createApiError, type JiraConfig, type PaginatedResult } from '@review-tracker/shared';
import type {
  JiraChangelogHistory,
  JiraChangelogPage,
  JiraIssue,
  JiraWorklog,
  JiraWorklogPage,
} from '../types/index.js';

export const ISSUE_FIELDS = ['summary', 'status', 'assignee', 'description', 'comment', 'created'];
export const PAGE_SIZE = 100;

/**
 * Read access to the ticket data the analysis needs
 */
export interface TicketSource {
  getIssue(issueKey: string): Promise<JiraIssue>;
  getChangelog(issueKey: string): Promise<JiraChangelogHistory[]>;
  getWorklogs(issueKey: string): Promise<JiraWorklog[]>;
}

export class JiraClient implements TicketSource {
  private client: AxiosInstance;

  constructor(config: JiraConfig, client?: AxiosInstance) {
    this.client = client ?? axios.create({
      baseURL: `${config.baseUrl}/rest/api/3`,
      auth: {
        username: config.email,
        password: config.apiToken
      },
      headers: {
        'Accept': 'application/json'
      },
      timeout: 30000
    });
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.get('/myself');
      return true;
    } catch (error) {
      throw createApiError(error, 'Connection test failed');
    }
  }

  async getIssue(issueKey: string): Promise<JiraIssue> {
    try {
      const response = await this.client.get<JiraIssue>(`/issue/${encodeURIComponent(issueKey)}`, {
        params: { fields: ISSUE_FIELDS.join(',') }
      });
      return response.data;
    } catch (error) {
      throw createApiError(error, `Failed to get issue ${issueKey}`);
    }
  }

  async getChangelog(issueKey: string): Promise<JiraChangelogHistory[]> {
    try {
      return await this.fetchAllPages(async (startAt) => {
        const response = await this.client.get<JiraChangelogPage>(`/issue/${encodeURIComponent(issueKey)}/changelog`, {
          params: { startAt, maxResults: PAGE_SIZE }
        });
        const { values, total, maxResults } = response.data;
        return { items: values ?? [], total, maxResults, startAt };
      });
    } catch (error) {
      throw createApiError(error, `Failed to get changelog for ${issueKey}`);
    }
  }

  async getWorklogs(issueKey: string): Promise<JiraWorklog[]> {
    try {
      return await this.fetchAllPages(async (startAt) => {
        const response = await this.client.get<JiraWorklogPage>(`/issue/${encodeURIComponent(issueKey)}/worklog`, {
          params: { startAt, maxResults: PAGE_SIZE }
        });
        const { worklogs, total, maxResults } = response.data;
        return { items: worklogs ?? [], total, maxResults, startAt };
      });
    } catch (error) {
      throw createApiError(error, `Failed to get worklogs for ${issueKey}`);
    }
  }

  /**
   * Walk an offset-paginated collection until `total` is reached or a page comes back empty
   */
  private async fetchAllPages<T>(fetchPage: (startAt: number) => Promise<PaginatedResult<T>>): Promise<T[]> {
    const collected: T[] = [];
    let startAt = 0;

    while (true) {
      const page = await fetchPage(startAt);
      collected.push(...page.items);
      if (page.items.length === 0 || startAt + page.items.length >= (page.total ?? 0)) {
        break;
      }
      startAt += page.items.length;
    }

    return collected;
  }
}
