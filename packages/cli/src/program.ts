import { Command } from 'commander';
import { UsageError, type IDependencyService } from '@linear-deps/core';

export interface GlobalOptions {
  verbose?: boolean;
}

export interface DepsOptions {
  team?: string;
  project?: string;
}

export type DepsTarget =
  | { kind: 'issue'; issueId: string }
  | { kind: 'team'; team: string; project?: string };

/**
 * Resolves the dependency service once arguments are known to be valid, so a
 * usage error never needs configuration or a network client.
 */
export type ServiceFactory = (options: GlobalOptions) => IDependencyService;

/**
 * Exactly one of an issue id or --team; --project only alongside --team.
 */
export function resolveDepsTarget(issueId: string | undefined, options: DepsOptions): DepsTarget {
  const id = issueId?.trim();
  const team = options.team?.trim();
  const project = options.project?.trim();

  if (project && !team) {
    throw new UsageError('--project requires --team');
  }
  if (id && team) {
    throw new UsageError('specify either an issue ID or --team, not both');
  }
  if (team) {
    return { kind: 'team', team, project: project || undefined };
  }
  if (!id) {
    throw new UsageError('specify an issue ID or --team');
  }
  return { kind: 'issue', issueId: id };
}

export function createProgram(createService: ServiceFactory): Command {
  const program = new Command();

  program
    .name('linear-deps')
    .description('Explore blocking dependencies between Linear issues')
    .version('1.0.0')
    .option('-v, --verbose', 'Log API calls and resolution steps to stderr');

  program
    .command('deps [issue-id]')
    .description('Show the dependency graph of an issue or a whole team')
    .option('-t, --team <key>', 'Team key or name (shows every blocking relationship in the team)')
    .option('-P, --project <name>', 'Only issues in this project (name or UUID, requires --team)')
    .addHelpText(
      'after',
      '\nExamples:\n  $ linear-deps deps ENG-100\n  $ linear-deps deps --team ENG\n  $ linear-deps deps --team ENG --project "Mobile App"'
    )
    .action(async (issueId: string | undefined, options: DepsOptions) => {
      let target: DepsTarget;
      try {
        target = resolveDepsTarget(issueId, options);
      } catch (error) {
        if (error instanceof UsageError) {
          console.error(`error: ${error.message}`);
          process.exitCode = 1;
          return;
        }
        throw error;
      }

      try {
        const service = createService(program.opts<GlobalOptions>());
        const report =
          target.kind === 'issue'
            ? await service.getIssueDependencies(target.issueId)
            : await service.getTeamDependencies(target.team, target.project);

        if (report.kind === 'empty') {
          console.log(report.message);
        } else {
          process.stdout.write(report.text);
        }
      } catch (error) {
        console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
      }
    });

  return program;
}
