import axios, { type AxiosInstance } from 'axios';
import { inject, injectable } from 'inversify';
import { ApiError, AuthenticationError, GraphQLError, ResolutionError, ValidationError } from './errors.js';
import { TYPES } from './tokens.js';
import { isUUID } from './utils.js';
import type { IssueWithRelations, LinearConfig, ProjectSummary, TeamSummary } from './types.js';

export const MAX_TEAM_ISSUES = 250;
const PROJECT_PAGE_SIZE = 100;

export interface ILinearClient {
  getIssueWithRelations(idOrKey: string): Promise<IssueWithRelations>;
  getTeamIssuesWithRelations(teamKey: string, limit?: number): Promise<IssueWithRelations[]>;
  listTeams(): Promise<TeamSummary[]>;
  listTeamProjects(teamId: string, limit?: number): Promise<ProjectSummary[]>;
  resolveTeam(keyOrName: string): Promise<TeamSummary>;
  resolveProject(nameOrId: string, teamId: string): Promise<string>;
}

interface GraphQLResponse<T> {
  data?: T | null;
  errors?: { message: string }[];
}

const ISSUE_FIELDS = `
  id
  identifier
  title
  state { id name }
`;

const RELATION_FIELDS = `
  relations {
    nodes {
      id
      type
      relatedIssue { ${ISSUE_FIELDS} }
    }
  }
  inverseRelations {
    nodes {
      id
      type
      issue { ${ISSUE_FIELDS} }
    }
  }
`;

export const ISSUE_WITH_RELATIONS_QUERY = `
  query GetIssueWithRelations($id: String!) {
    issue(id: $id) {
      ${ISSUE_FIELDS}
      ${RELATION_FIELDS}
    }
  }
`;

export const TEAM_ISSUES_WITH_RELATIONS_QUERY = `
  query GetTeamIssuesWithRelations($teamKey: String!, $first: Int!) {
    issues(filter: { team: { key: { eq: $teamKey } } }, first: $first) {
      nodes {
        ${ISSUE_FIELDS}
        project { id name }
        ${RELATION_FIELDS}
      }
    }
  }
`;

export const TEAMS_QUERY = `
  query ListTeams {
    teams(first: 250) {
      nodes { id key name }
    }
  }
`;

export const TEAM_PROJECTS_QUERY = `
  query ListProjectsByTeam($teamId: String!, $first: Int) {
    team(id: $teamId) {
      projects(first: $first) {
        nodes { id name state }
      }
    }
  }
`;

/**
 * Personal API keys are sent as-is; anything else is treated as an OAuth
 * access token.
 */
export function authorizationHeader(apiKey: string): string {
  if (apiKey.startsWith('lin_api_') || apiKey.startsWith('Bearer ')) {
    return apiKey;
  }
  return `Bearer ${apiKey}`;
}

function requireValue(field: string, value: string): void {
  if (!value.trim()) {
    throw new ValidationError(field, 'cannot be empty');
  }
}

@injectable()
export class LinearClient implements ILinearClient {
  private api: AxiosInstance;

  constructor(@inject(TYPES.Config) config: LinearConfig) {
    this.api = axios.create({
      baseURL: config.apiUrl,
      timeout: config.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
        Authorization: authorizationHeader(config.apiKey),
      },
    });
  }

  async execute<T>(query: string, variables: Record<string, unknown> = {}): Promise<T> {
    let body: GraphQLResponse<T>;
    try {
      const response = await this.api.post<GraphQLResponse<T>>('', { query, variables });
      body = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status === 401 || status === 403) {
          throw new AuthenticationError(status);
        }
        throw new ApiError(status ? `request failed with HTTP ${status}` : `request failed: ${error.message}`, status);
      }
      throw error;
    }

    if (body.errors && body.errors.length > 0) {
      throw new GraphQLError(body.errors.map(e => e.message));
    }
    if (body.data === undefined || body.data === null) {
      throw new ApiError('response contained no data');
    }
    return body.data;
  }

  async getIssueWithRelations(idOrKey: string): Promise<IssueWithRelations> {
    requireValue('issueID', idOrKey);
    const data = await this.execute<{ issue: IssueWithRelations | null }>(ISSUE_WITH_RELATIONS_QUERY, { id: idOrKey });
    if (!data.issue) {
      throw new ApiError(`issue not found: ${idOrKey}`);
    }
    return data.issue;
  }

  async getTeamIssuesWithRelations(teamKey: string, limit: number = MAX_TEAM_ISSUES): Promise<IssueWithRelations[]> {
    requireValue('teamID', teamKey);
    const first = Math.min(Math.max(1, Math.floor(limit)), MAX_TEAM_ISSUES);
    const data = await this.execute<{ issues: { nodes: IssueWithRelations[] } }>(TEAM_ISSUES_WITH_RELATIONS_QUERY, {
      teamKey,
      first,
    });
    return data.issues.nodes;
  }

  async listTeams(): Promise<TeamSummary[]> {
    const data = await this.execute<{ teams: { nodes: TeamSummary[] } }>(TEAMS_QUERY);
    return data.teams.nodes;
  }

  async listTeamProjects(teamId: string, limit: number = PROJECT_PAGE_SIZE): Promise<ProjectSummary[]> {
    requireValue('teamID', teamId);
    const data = await this.execute<{ team: { projects: { nodes: ProjectSummary[] } } | null }>(TEAM_PROJECTS_QUERY, {
      teamId,
      first: limit,
    });
    return data.team?.projects.nodes ?? [];
  }

  /**
   * Matches a team by key first, then by name, both case-insensitively.
   */
  async resolveTeam(keyOrName: string): Promise<TeamSummary> {
    requireValue('team', keyOrName);
    const teams = await this.listTeams();

    const key = keyOrName.toUpperCase();
    const byKey = teams.find(t => t.key.toUpperCase() === key);
    if (byKey) return byKey;

    const name = keyOrName.toLowerCase();
    const byName = teams.find(t => t.name.toLowerCase() === name);
    if (byName) return byName;

    throw new ResolutionError('team', keyOrName, 'not found', teams.map(t => t.key));
  }

  /**
   * Returns the project UUID. UUIDs pass through unchecked; names must match
   * exactly one of the team's projects, ignoring case.
   */
  async resolveProject(nameOrId: string, teamId: string): Promise<string> {
    requireValue('project', nameOrId);
    if (isUUID(nameOrId)) {
      return nameOrId;
    }

    const projects = await this.listTeamProjects(teamId);
    const name = nameOrId.toLowerCase();
    const matches = projects.filter(p => p.name.toLowerCase() === name);

    if (matches.length === 0) {
      throw new ResolutionError('project', nameOrId, 'not found', projects.map(p => p.name));
    }
    if (matches.length > 1) {
      throw new ResolutionError('project', nameOrId, 'ambiguous', matches.map(p => `${p.name} (ID: ${p.id})`));
    }
    return matches[0].id;
  }
}
