#!/usr/bin/env node

/**
 * Jira Workflow MCP Server
 * Reconstructs ticket lifecycles from Jira changelogs: bounce-backs, blocked entries,
 * time in each state, and Testim references in ticket prose.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema, type Tool } from '@modelcontextprotocol/sdk/types.js';
import { getErrorMessage, loadEnv, MethodNotFoundError } from '@review-tracker/shared';
import { JiraClient } from './clients/jira-client.js';
import { loadServerConfig, type ServerConfig } from './config.js';
import { MAX_BATCH_SIZE, WorkflowHandler } from './handlers/workflow.js';
import { WorkflowReportFormatter } from './services/report-formatter.js';
import { TicketAnalysisService } from './services/ticket-analysis.service.js';
import { WorkflowAnalyzer } from './workflow/workflow-analyzer.js';

export const TOOLS: Tool[] = [
  {
    name: 'analyze_ticket',
    description: 'Analyze one Jira ticket: status transitions, bounce-backs (moves to an earlier workflow stage), blocked entries, time spent in each state, logged hours and Testim references.',
    inputSchema: {
      type: 'object',
      properties: {
        issueKey: { type: 'string', description: 'Issue key (e.g., PROJ-123)' }
      },
      required: ['issueKey']
    }
  },
  {
    name: 'analyze_tickets',
    description: 'Analyze several Jira tickets and summarize bounce-backs, average hours per workflow stage and logged hours. Tickets that fail are listed separately and do not stop the others.',
    inputSchema: {
      type: 'object',
      properties: {
        issueKeys: {
          type: 'array',
          items: { type: 'string' },
          description: `Issue keys (e.g., ["PROJ-123", "PROJ-456"]), at most ${MAX_BATCH_SIZE}`
        }
      },
      required: ['issueKeys']
    }
  },
  {
    name: 'find_test_references',
    description: 'Find Testim references (URLs, "Testim: name" mentions, test id/name/link/url/ref values) in a description and optional comments.',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Primary text, e.g. the ticket description' },
        comments: { type: 'array', items: { type: 'string' }, description: 'Additional texts scanned after the primary text', default: [] }
      },
      required: ['text']
    }
  },
  {
    name: 'get_workflow_model',
    description: 'Show the workflow stage order and blocked states used to classify transitions.',
    inputSchema: {
      type: 'object',
      properties: {},
      required: []
    }
  }
];

export class JiraWorkflowServer {
  private server: Server;
  private jira: JiraClient;
  private handler: WorkflowHandler;

  constructor(config: ServerConfig) {
    this.server = new Server(
      {
        name: 'jira-workflow-mcp-server',
        version: '1.0.0',
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    console.error('Jira config:', {
      baseUrl: config.jira.baseUrl,
      email: config.jira.email,
      hasToken: !!config.jira.apiToken,
      workflow: config.workflow.describe(),
      concurrency: config.concurrency
    });

    this.jira = new JiraClient(config.jira);
    const analyzer = new WorkflowAnalyzer({ model: config.workflow });
    const service = new TicketAnalysisService(this.jira, analyzer, config.concurrency);
    this.handler = new WorkflowHandler(service, new WorkflowReportFormatter(config.workflow), config.workflow);
    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;

      switch (name) {
        case 'analyze_ticket':
          return await this.handler.analyzeTicket(args);
        case 'analyze_tickets':
          return await this.handler.analyzeTickets(args);
        case 'find_test_references':
          return this.handler.findTestReferences(args);
        case 'get_workflow_model':
          return this.handler.getWorkflowModel();
        default:
          throw new MethodNotFoundError(name).toMcpError();
      }
    });
  }

  async run(): Promise<void> {
    await this.jira.testConnection();
    console.error('✅ Jira connection successful');

    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    console.error('🚀 Jira workflow MCP server running on stdio');
  }
}

if (require.main === module) {
  loadEnv();
  try {
    const server = new JiraWorkflowServer(loadServerConfig());
    server.run().catch((error: unknown) => {
      console.error('❌ Failed to start server:', getErrorMessage(error));
      process.exit(1);
    });
  } catch (error) {
    console.error('❌ Missing or invalid configuration:', getErrorMessage(error));
    console.error('Please set JIRA_BASE_URL, JIRA_EMAIL, and JIRA_API_TOKEN in .env');
    process.exit(1);
  }
}
