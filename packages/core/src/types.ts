export interface WorkflowState {
  id: string;
  name: string;
}

export interface IssueMinimal {
  id: string;
  identifier: string;
  title: string;
  state: WorkflowState | null;
}

// Relation types reported by Linear. Only 'blocks' participates in the graph.
export type IssueRelationType = 'blocks' | 'duplicate' | 'related' | 'similar';

export interface IssueRelation {
  id: string;
  type: IssueRelationType;
  issue?: IssueMinimal | null;
  relatedIssue?: IssueMinimal | null;
}

export interface IssueRelationConnection {
  nodes: IssueRelation[];
}

export interface ProjectRef {
  id: string;
  name: string;
}

export interface IssueWithRelations extends IssueMinimal {
  project?: ProjectRef | null;
  relations: IssueRelationConnection;
  inverseRelations: IssueRelationConnection;
}

export interface TeamSummary {
  id: string;
  key: string;
  name: string;
}

export interface ProjectSummary {
  id: string;
  name: string;
  state?: string;
}

export interface DepNode {
  id: string;
  identifier: string;
  title: string;
  state: string;
}

export interface DepEdge {
  from: string; // blocker
  to: string; // blocked
  type: 'blocks';
}

export interface DepGraph {
  nodes: ReadonlyMap<string, DepNode>;
  edges: readonly DepEdge[];
}

export type Cycle = string[];

export type RenderMode =
  | { kind: 'issue'; rootKey: string }
  | { kind: 'team'; teamKey: string; projectName?: string };

export type DependencyReport =
  | { kind: 'graph'; text: string; graph: DepGraph; cycles: Cycle[] }
  | { kind: 'empty'; message: string };

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface LinearConfig {
  apiKey: string;
  apiUrl: string;
  timeoutMs: number;
  logLevel: LogLevelName;
}
