import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema, type Tool } from '@modelcontextprotocol/sdk/types.js';
import { isRecord, readString, ValidationError, type DependencyReport, type IDependencyService } from '@linear-deps/core';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export const TOOLS: Tool[] = [
  {
    name: 'linear_issue_dependencies',
    description: 'Show what a Linear issue blocks and what blocks it, with any circular dependencies',
    inputSchema: {
      type: 'object',
      properties: {
        issue_id: { type: 'string', description: 'Issue identifier (e.g. ENG-100) or UUID' },
      },
      required: ['issue_id'],
    },
  },
  {
    name: 'linear_team_dependencies',
    description: 'Show the blocking-dependency tree of a Linear team, optionally limited to one project',
    inputSchema: {
      type: 'object',
      properties: {
        team: { type: 'string', description: 'Team key (e.g. ENG) or name' },
        project: { type: 'string', description: 'Project name or UUID' },
      },
      required: ['team'],
    },
  },
];

function textResult(report: DependencyReport): ToolResult {
  return { content: [{ type: 'text', text: report.kind === 'empty' ? report.message : report.text }] };
}

function requireString(args: Record<string, unknown>, key: string): string {
  const value = readString(args, key);
  if (value === undefined) {
    throw new ValidationError(key, 'is required');
  }
  return value;
}

export class DepsMCPServer {
  private server: Server;

  constructor(private service: IDependencyService) {
    this.server = new Server({ name: 'linear-deps-mcp', version: '1.0.0' }, { capabilities: { tools: {} } });
    this.setupToolHandlers();
  }

  private setupToolHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

    this.server.setRequestHandler(CallToolRequestSchema, async request =>
      this.handleToolCall(request.params.name, request.params.arguments)
    );
  }

  /**
   * Dispatches one tool call. Failures come back as an error result rather
   * than a protocol error so the client can show the message.
   */
  async handleToolCall(name: string, args: unknown): Promise<ToolResult> {
    try {
      const params = isRecord(args) ? args : {};
      switch (name) {
        case 'linear_issue_dependencies':
          return textResult(await this.service.getIssueDependencies(requireString(params, 'issue_id')));
        case 'linear_team_dependencies':
          return textResult(
            await this.service.getTeamDependencies(requireString(params, 'team'), readString(params, 'project'))
          );
        default:
          throw new Error(`Unknown tool: ${name}`);
      }
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      return {
        content: [{ type: 'text', text: `Error: ${errorMessage}` }],
        isError: true,
      };
    }
  }

  async start() {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    console.error('linear-deps MCP server started');
  }
}
