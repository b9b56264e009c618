import { inject, injectable } from 'inversify';
import { FetchError, ResolutionError, ValidationError } from './errors.js';
import type { IGraphService } from './graph.js';
import { MAX_TEAM_ISSUES, type ILinearClient } from './linear.js';
import type { ILogger } from './logger.js';
import type { IRenderService } from './render.js';
import { TYPES } from './tokens.js';
import type { DepGraph, DependencyReport, RenderMode } from './types.js';

export interface IDependencyService {
  getIssueDependencies(issueId: string): Promise<DependencyReport>;
  /**
   * Resolves the team by key or name first, so the issue query always uses
   * the canonical key.
   */
  getTeamDependencies(teamRef: string, project?: string): Promise<DependencyReport>;
}

@injectable()
export class DependencyService implements IDependencyService {
  constructor(
    @inject(TYPES.ILinearClient) private client: ILinearClient,
    @inject(TYPES.IGraphService) private graph: IGraphService,
    @inject(TYPES.IRenderService) private renderer: IRenderService,
    @inject(TYPES.ILogger) private logger: ILogger
  ) {}

  async getIssueDependencies(issueId: string): Promise<DependencyReport> {
    this.logger.debug(`Fetching relations for ${issueId}`);
    const issue = await this.fetchStep('failed to get issue', () => this.client.getIssueWithRelations(issueId));

    const graph = this.graph.buildIssueGraph(issue);
    if (graph.edges.length === 0) {
      return { kind: 'empty', message: `No dependencies found for ${issue.identifier}` };
    }
    return this.report(graph, { kind: 'issue', rootKey: issue.identifier });
  }

  async getTeamDependencies(teamRef: string, project?: string): Promise<DependencyReport> {
    const team = await this.fetchStep('failed to get teams', () => this.client.resolveTeam(teamRef));
    this.logger.debug(`Resolved team '${teamRef}' to ${team.key}`);

    let projectId: string | undefined;
    if (project) {
      projectId = await this.fetchStep('failed to get projects', () => this.client.resolveProject(project, team.id));
      this.logger.info(`Resolved project '${project}' to ${projectId}`);
    }

    this.logger.debug(`Fetching up to ${MAX_TEAM_ISSUES} issues for team ${team.key}`);
    const issues = await this.fetchStep('failed to get team issues', () =>
      this.client.getTeamIssuesWithRelations(team.key, MAX_TEAM_ISSUES)
    );

    const graph = this.graph.buildTeamGraph(issues, projectId);
    if (graph.edges.length === 0) {
      return { kind: 'empty', message: `No dependencies found for team ${team.key}` };
    }
    return this.report(graph, { kind: 'team', teamKey: team.key, projectName: project });
  }

  private report(graph: DepGraph, mode: RenderMode): DependencyReport {
    const cycles = this.graph.detectCycles(graph);
    if (cycles.length > 0) {
      this.logger.warn(`Found ${cycles.length} circular dependenc${cycles.length === 1 ? 'y' : 'ies'}`);
    }
    return { kind: 'graph', text: this.renderer.render(graph, mode, cycles), graph, cycles };
  }

  /**
   * Runs one upstream call. Our own errors (resolution, validation) pass
   * through; anything else is wrapped with the step that failed.
   */
  private async fetchStep<T>(step: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof ResolutionError || error instanceof ValidationError) {
        throw error;
      }
      throw new FetchError(step, error);
    }
  }
}
