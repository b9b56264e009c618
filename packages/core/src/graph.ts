import { injectable } from 'inversify';
import type { Cycle, DepEdge, DepGraph, DepNode, IssueMinimal, IssueWithRelations } from './types.js';

export interface IGraphService {
  buildIssueGraph(issue: IssueWithRelations): DepGraph;
  buildTeamGraph(issues: IssueWithRelations[], projectId?: string): DepGraph;
  detectCycles(graph: DepGraph): Cycle[];
}

export function toDepNode(issue: IssueMinimal): DepNode {
  return {
    id: issue.id,
    identifier: issue.identifier,
    title: issue.title,
    state: issue.state?.name ?? '',
  };
}

/**
 * Inserts a node keyed by its identifier. The first record wins; a later
 * record for the same key only fills fields that are still empty.
 */
export function upsertNode(nodes: Map<string, DepNode>, candidate: DepNode): void {
  const existing = nodes.get(candidate.identifier);
  if (!existing) {
    nodes.set(candidate.identifier, { ...candidate });
    return;
  }
  if (!existing.id) existing.id = candidate.id;
  if (!existing.title) existing.title = candidate.title;
  if (!existing.state) existing.state = candidate.state;
}

/**
 * Freezes a node map and edge list into a graph, dropping edges whose
 * endpoints are not in the node map.
 */
export function createGraph(nodes: Map<string, DepNode>, edges: DepEdge[]): DepGraph {
  const kept = edges.filter(e => nodes.has(e.from) && nodes.has(e.to));
  return {
    nodes: new Map(nodes),
    edges: Object.freeze(kept),
  };
}

@injectable()
export class GraphService implements IGraphService {
  buildIssueGraph(issue: IssueWithRelations): DepGraph {
    const nodes = new Map<string, DepNode>();
    const edges: DepEdge[] = [];
    upsertNode(nodes, toDepNode(issue));

    // What this issue blocks
    for (const rel of issue.relations.nodes) {
      if (rel.type !== 'blocks' || !rel.relatedIssue) continue;
      upsertNode(nodes, toDepNode(rel.relatedIssue));
      edges.push({ from: issue.identifier, to: rel.relatedIssue.identifier, type: 'blocks' });
    }

    // What blocks this issue
    for (const rel of issue.inverseRelations.nodes) {
      if (rel.type !== 'blocks' || !rel.issue) continue;
      upsertNode(nodes, toDepNode(rel.issue));
      edges.push({ from: rel.issue.identifier, to: issue.identifier, type: 'blocks' });
    }

    return createGraph(nodes, edges);
  }

  buildTeamGraph(issues: IssueWithRelations[], projectId?: string): DepGraph {
    const nodes = new Map<string, DepNode>();
    const edges: DepEdge[] = [];

    for (const issue of issues) {
      if (projectId && issue.project?.id !== projectId) continue;
      upsertNode(nodes, toDepNode(issue));

      for (const rel of issue.relations.nodes) {
        if (rel.type !== 'blocks' || !rel.relatedIssue) continue;
        // Blocked issues outside the filter still appear so the edge can be drawn
        upsertNode(nodes, toDepNode(rel.relatedIssue));
        edges.push({ from: issue.identifier, to: rel.relatedIssue.identifier, type: 'blocks' });
      }
    }

    return createGraph(nodes, edges);
  }

  /**
   * Reports every strongly connected component with more than one member,
   * and every self-loop, as a closed walk: members in discovery order
   * followed by the first member again.
   *
   * Tarjan's algorithm; vertices are visited in node insertion order and
   * neighbours in edge order, so the result is stable for a given graph.
   */
  detectCycles(graph: DepGraph): Cycle[] {
    const adjacency = new Map<string, string[]>();
    const selfLoops = new Set<string>();
    for (const id of graph.nodes.keys()) {
      adjacency.set(id, []);
    }
    for (const e of graph.edges) {
      adjacency.get(e.from)?.push(e.to);
      if (e.from === e.to) selfLoops.add(e.from);
    }

    const index = new Map<string, number>();
    const lowlink = new Map<string, number>();
    const stack: string[] = [];
    const onStack = new Set<string>();
    const cycles: Cycle[] = [];
    let counter = 0;

    const strongConnect = (v: string): void => {
      index.set(v, counter);
      lowlink.set(v, counter);
      counter++;
      stack.push(v);
      onStack.add(v);

      for (const w of adjacency.get(v) ?? []) {
        const wIndex = index.get(w);
        if (wIndex === undefined) {
          strongConnect(w);
          lowlink.set(v, Math.min(lowlink.get(v) ?? 0, lowlink.get(w) ?? 0));
        } else if (onStack.has(w)) {
          lowlink.set(v, Math.min(lowlink.get(v) ?? 0, wIndex));
        }
      }

      if (lowlink.get(v) !== index.get(v)) return;

      const component: string[] = [];
      let w: string | undefined;
      do {
        w = stack.pop();
        if (w === undefined) break;
        onStack.delete(w);
        component.push(w);
      } while (w !== v);
      component.reverse();

      if (component.length > 1) {
        cycles.push([...component, component[0]]);
      } else if (selfLoops.has(v)) {
        cycles.push([v, v]);
      }
    };

    for (const v of graph.nodes.keys()) {
      if (!index.has(v)) strongConnect(v);
    }

    return cycles;
  }
}
