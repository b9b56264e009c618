import { injectable } from 'inversify';
import { RootNotFoundError } from './errors.js';
import { truncateTitle, uniqueInOrder } from './utils.js';
import type { Cycle, DepEdge, DepGraph, RenderMode } from './types.js';

export const MAX_RENDER_DEPTH = 10;
export const MAX_FALLBACK_ROOTS = 5;
export const RULE_WIDTH = 50;

const ROOT_TITLE_WIDTH = 40;
const RELATION_TITLE_WIDTH = 30;
const TREE_TITLE_WIDTH = 35;

export interface IRenderService {
  render(graph: DepGraph, mode: RenderMode, cycles: Cycle[]): string;
}

/**
 * Traversal state for one team rendering. Passed by reference through the
 * recursive calls so the renderer itself holds no state.
 */
export interface RenderContext {
  graph: DepGraph;
  adjacency: ReadonlyMap<string, readonly string[]>;
  rendered: Set<string>;
  lines: string[];
}

export function formatCycles(cycles: Cycle[]): string[] {
  if (cycles.length === 0) return [];
  return ['', '⚠ Circular dependencies detected:', ...cycles.map(cycle => `  ${cycle.join(' → ')}`)];
}

/**
 * Pure blockers (outgoing edges, no incoming edges) in first-seen order. When
 * every blocker is itself blocked, the first few blockers stand in.
 */
export function findRoots(edges: readonly DepEdge[]): string[] {
  const blockers = uniqueInOrder(edges.map(e => e.from));
  const blocked = new Set(edges.map(e => e.to));
  const roots = blockers.filter(id => !blocked.has(id));
  return roots.length > 0 ? roots : blockers.slice(0, MAX_FALLBACK_ROOTS);
}

export function buildAdjacency(edges: readonly DepEdge[]): Map<string, string[]> {
  const adjacency = new Map<string, string[]>();
  for (const e of edges) {
    const children = adjacency.get(e.from);
    if (children) {
      children.push(e.to);
    } else {
      adjacency.set(e.from, [e.to]);
    }
  }
  return adjacency;
}

/**
 * Adds start and everything downstream of it to reached, ignoring the depth
 * ceiling.
 */
export function markReachable(
  adjacency: ReadonlyMap<string, readonly string[]>,
  start: string,
  reached: Set<string>
): void {
  const pending = [start];
  while (pending.length > 0) {
    const id = pending.pop();
    if (id === undefined || reached.has(id)) continue;
    reached.add(id);
    pending.push(...(adjacency.get(id) ?? []));
  }
}

export function renderSubtree(
  ctx: RenderContext,
  nodeId: string,
  prefix: string,
  isLast: boolean,
  depth: number
): void {
  if (depth > MAX_RENDER_DEPTH) return;

  const node = ctx.graph.nodes.get(nodeId);
  if (!node) return;

  const connector = depth === 0 ? '' : isLast ? '└─ ' : '├─ ';

  if (ctx.rendered.has(nodeId)) {
    ctx.lines.push(`${prefix}${connector}${node.identifier} [${node.state}] (already shown)`);
    return;
  }
  ctx.rendered.add(nodeId);
  ctx.lines.push(`${prefix}${connector}${node.identifier} [${node.state}] ${truncateTitle(node.title, TREE_TITLE_WIDTH)}`);

  const children = ctx.adjacency.get(nodeId) ?? [];
  const childPrefix = depth === 0 ? '' : prefix + (isLast ? '   ' : '│  ');
  children.forEach((childId, i) => {
    renderSubtree(ctx, childId, childPrefix, i === children.length - 1, depth + 1);
  });
}

@injectable()
export class RenderService implements IRenderService {
  render(graph: DepGraph, mode: RenderMode, cycles: Cycle[]): string {
    const lines = mode.kind === 'issue'
      ? this.renderIssue(graph, mode.rootKey)
      : this.renderTeam(graph, mode.teamKey, mode.projectName);

    const noun = mode.kind === 'issue' ? 'dependencies' : 'blocking relationships';
    lines.push('─'.repeat(RULE_WIDTH));
    lines.push(`${graph.nodes.size} issues, ${graph.edges.length} ${noun}`);
    lines.push(...formatCycles(cycles));

    return lines.join('\n') + '\n';
  }

  private renderIssue(graph: DepGraph, rootKey: string): string[] {
    const root = graph.nodes.get(rootKey);
    if (!root) {
      throw new RootNotFoundError(rootKey);
    }

    const lines = [
      `DEPENDENCY GRAPH: ${rootKey}`,
      '═'.repeat(RULE_WIDTH),
      `${root.identifier} ${truncateTitle(root.title, ROOT_TITLE_WIDTH)}`,
    ];

    const related = [
      ...graph.edges.filter(e => e.from === rootKey).map(e => ({ arrow: '→', key: e.to })),
      ...graph.edges.filter(e => e.to === rootKey).map(e => ({ arrow: '←', key: e.from })),
    ];

    related.forEach(({ arrow, key }, i) => {
      const node = graph.nodes.get(key);
      if (!node) return;
      const connector = i === related.length - 1 ? '└─' : '├─';
      lines.push(`${connector} ${arrow} ${node.identifier} [${node.state}] ${truncateTitle(node.title, RELATION_TITLE_WIDTH)}`);
    });

    return lines;
  }

  private renderTeam(graph: DepGraph, teamKey: string, projectName?: string): string[] {
    const header = projectName
      ? `DEPENDENCY GRAPH: Team ${teamKey} (project: ${projectName})`
      : `DEPENDENCY GRAPH: Team ${teamKey}`;

    const ctx: RenderContext = {
      graph,
      adjacency: buildAdjacency(graph.edges),
      rendered: new Set<string>(),
      lines: [header, '═'.repeat(RULE_WIDTH)],
    };

    const reached = new Set<string>();
    for (const rootId of findRoots(graph.edges)) {
      markReachable(ctx.adjacency, rootId, reached);
      if (ctx.rendered.has(rootId)) continue;
      renderSubtree(ctx, rootId, '', true, 0);
    }

    // Components no root leads into (a cycle beside an acyclic chain)
    for (const blockerId of uniqueInOrder(graph.edges.map(e => e.from))) {
      if (reached.has(blockerId)) continue;
      markReachable(ctx.adjacency, blockerId, reached);
      renderSubtree(ctx, blockerId, '', true, 0);
    }

    return ctx.lines;
  }
}
