import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DependencyService } from './dependencies.js';
import { FetchError, ResolutionError } from './errors.js';
import { GraphService } from './graph.js';
import type { ILinearClient } from './linear.js';
import type { ILogger } from './logger.js';
import { RenderService } from './render.js';
import type { IssueMinimal, IssueWithRelations } from './types.js';

function minimal(identifier: string, title: string, state = 'Todo'): IssueMinimal {
  return { id: `uuid-${identifier}`, identifier, title, state: { id: `s-${state}`, name: state } };
}

function withRelations(
  base: IssueMinimal,
  blocks: IssueMinimal[] = [],
  blockedBy: IssueMinimal[] = [],
  projectId?: string
): IssueWithRelations {
  return {
    ...base,
    project: projectId ? { id: projectId, name: projectId } : null,
    relations: { nodes: blocks.map(b => ({ id: `r-${b.identifier}`, type: 'blocks' as const, relatedIssue: b })) },
    inverseRelations: { nodes: blockedBy.map(b => ({ id: `i-${b.identifier}`, type: 'blocks' as const, issue: b })) },
  };
}

describe('DependencyService', () => {
  let mockClient: {
    [K in keyof ILinearClient]: ReturnType<typeof vi.fn>;
  };
  let mockLogger: ILogger;
  let service: DependencyService;

  beforeEach(() => {
    mockClient = {
      getIssueWithRelations: vi.fn(),
      getTeamIssuesWithRelations: vi.fn(),
      listTeams: vi.fn(),
      listTeamProjects: vi.fn(),
      resolveTeam: vi.fn(),
      resolveProject: vi.fn(),
    };
    mockLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    service = new DependencyService(mockClient, new GraphService(), new RenderService(), mockLogger);
  });

  describe('getIssueDependencies', () => {
    it('should render what the issue blocks and what blocks it', async () => {
      mockClient.getIssueWithRelations.mockResolvedValue(
        withRelations(
          minimal('ENG-100', 'Implement login'),
          [minimal('ENG-101', 'Add session storage')],
          [minimal('ENG-099', 'Set up OAuth app', 'Done')]
        )
      );

      const report = await service.getIssueDependencies('ENG-100');

      expect(report.kind).toBe('graph');
      if (report.kind !== 'graph') return;
      const lines = report.text.split('\n');
      expect(lines.filter(l => l.includes(' → '))).toEqual(['├─ → ENG-101 [Todo] Add session storage']);
      expect(lines.filter(l => l.includes(' ← '))).toEqual(['└─ ← ENG-099 [Done] Set up OAuth app']);
      expect(lines).toContain('3 issues, 2 dependencies');
      expect(report.text).not.toContain('Circular dependencies');
      expect(report.cycles).toEqual([]);
    });

    it('should report an issue without relations as empty', async () => {
      mockClient.getIssueWithRelations.mockResolvedValue(withRelations(minimal('ENG-5', 'Lonely')));

      const report = await service.getIssueDependencies('eng-5');

      expect(report).toEqual({ kind: 'empty', message: 'No dependencies found for ENG-5' });
    });

    it('should wrap fetch failures with the failing step', async () => {
      const cause = new Error('socket hang up');
      mockClient.getIssueWithRelations.mockRejectedValue(cause);

      const error = await service.getIssueDependencies('ENG-1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      if (error instanceof FetchError) {
        expect(error.message).toBe('failed to get issue: socket hang up');
        expect(error.cause).toBe(cause);
      }
    });
  });

  describe('getTeamDependencies', () => {
    beforeEach(() => {
      mockClient.resolveTeam.mockResolvedValue({ id: 'team-1', key: 'ENG', name: 'Engineering' });
    });

    it('should fetch up to 250 issues and render the team tree', async () => {
      const a = minimal('ENG-1', 'Alpha');
      const b = minimal('ENG-2', 'Beta');
      mockClient.getTeamIssuesWithRelations.mockResolvedValue([withRelations(a, [b]), withRelations(b)]);

      const report = await service.getTeamDependencies('ENG');

      expect(mockClient.resolveTeam).toHaveBeenCalledWith('ENG');
      expect(mockClient.getTeamIssuesWithRelations).toHaveBeenCalledWith('ENG', 250);
      expect(report.kind).toBe('graph');
      if (report.kind !== 'graph') return;
      expect(report.text.split('\n').slice(0, 4)).toEqual([
        'DEPENDENCY GRAPH: Team ENG',
        '═'.repeat(50),
        'ENG-1 [Todo] Alpha',
        '└─ ENG-2 [Todo] Beta',
      ]);
    });

    it('should report a team without blocking relations as empty', async () => {
      mockClient.getTeamIssuesWithRelations.mockResolvedValue([withRelations(minimal('ENG-1', 'Alpha'))]);

      const report = await service.getTeamDependencies('ENG');

      expect(report).toEqual({ kind: 'empty', message: 'No dependencies found for team ENG' });
    });

    it('should resolve the project before fetching and filter by it', async () => {
      const x = minimal('ENG-1', 'In project');
      const y = minimal('ENG-2', 'Other project');
      const z = minimal('ENG-3', 'Downstream');
      mockClient.resolveProject.mockResolvedValue('p1');
      mockClient.getTeamIssuesWithRelations.mockResolvedValue([
        withRelations(x, [y], [], 'p1'),
        withRelations(y, [z], [], 'p2'),
      ]);

      const report = await service.getTeamDependencies('ENG', 'Mobile');

      expect(mockClient.resolveProject).toHaveBeenCalledWith('Mobile', 'team-1');
      expect(report.kind).toBe('graph');
      if (report.kind !== 'graph') return;
      expect([...report.graph.nodes.keys()]).toEqual(['ENG-1', 'ENG-2']);
      expect(report.graph.edges).toEqual([{ from: 'ENG-1', to: 'ENG-2', type: 'blocks' }]);
      expect(report.text.split('\n')[0]).toBe('DEPENDENCY GRAPH: Team ENG (project: Mobile)');
    });

    it('should abort when the project cannot be resolved', async () => {
      mockClient.resolveProject.mockRejectedValue(new ResolutionError('project', 'Mobile', 'not found'));

      await expect(service.getTeamDependencies('ENG', 'Mobile')).rejects.toThrow(
        "failed to resolve project 'Mobile': not found"
      );
      expect(mockClient.getTeamIssuesWithRelations).not.toHaveBeenCalled();
    });

    it('should warn about and list every cycle', async () => {
      const a = minimal('A', 'Alpha');
      const b = minimal('B', 'Beta');
      const c = minimal('C', 'Gamma');
      mockClient.getTeamIssuesWithRelations.mockResolvedValue([
        withRelations(a, [b]),
        withRelations(b, [c]),
        withRelations(c, [a]),
      ]);

      const report = await service.getTeamDependencies('ENG');

      expect(report.kind).toBe('graph');
      if (report.kind !== 'graph') return;
      expect(report.text.split('\n').filter(l => l.startsWith('  ') && l.includes(' → '))).toEqual(['  A → B → C → A']);
      expect(mockLogger.warn).toHaveBeenCalledWith('Found 1 circular dependency');
    });

    it('should query issues by the resolved team key when given a name', async () => {
      const a = minimal('ENG-1', 'Alpha');
      const b = minimal('ENG-2', 'Beta');
      mockClient.resolveProject.mockResolvedValue('p1');
      mockClient.getTeamIssuesWithRelations.mockResolvedValue([withRelations(a, [b], [], 'p1')]);

      const report = await service.getTeamDependencies('Engineering', 'Mobile');

      expect(mockClient.resolveTeam).toHaveBeenCalledWith('Engineering');
      expect(mockClient.getTeamIssuesWithRelations).toHaveBeenCalledWith('ENG', 250);
      expect(report.kind).toBe('graph');
      if (report.kind !== 'graph') return;
      expect(report.text.split('\n')[0]).toBe('DEPENDENCY GRAPH: Team ENG (project: Mobile)');
    });

    it('should report the resolved key when a lowercase team has no dependencies', async () => {
      mockClient.getTeamIssuesWithRelations.mockResolvedValue([]);

      const report = await service.getTeamDependencies('eng');

      expect(mockClient.getTeamIssuesWithRelations).toHaveBeenCalledWith('ENG', 250);
      expect(report).toEqual({ kind: 'empty', message: 'No dependencies found for team ENG' });
    });

    it('should abort when the team cannot be resolved', async () => {
      mockClient.resolveTeam.mockRejectedValue(new ResolutionError('team', 'OPS', 'not found', ['ENG']));

      await expect(service.getTeamDependencies('OPS')).rejects.toThrow(
        "failed to resolve team 'OPS': not found (available: ENG)"
      );
      expect(mockClient.getTeamIssuesWithRelations).not.toHaveBeenCalled();
    });

    it('should wrap team fetch failures', async () => {
      mockClient.getTeamIssuesWithRelations.mockRejectedValue(new Error('HTTP 502'));

      await expect(service.getTeamDependencies('ENG')).rejects.toThrow('failed to get team issues: HTTP 502');
    });
  });
});
