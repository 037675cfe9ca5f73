export type NodeStateToken = 'idle' | 'allocated' | 'mixed' | 'down' | 'unknown';

export interface Job {
  id: string;
  partition: string;
  name: string;
}

export interface NodeState {
  nodeId: string;
  state: NodeStateToken;
}

/** Activity per node; a missing key means "no information this tick". */
export type NodeActivity = Readonly<Record<string, boolean>>;

export interface CanonicalSnapshot {
  readonly classicalActive: boolean;
  readonly quantumActive: boolean;
  readonly nodeActive: NodeActivity;
}

export type Rgb = readonly [number, number, number];

export interface MatrixText {
  readonly text: string;
  /** One color per glyph of `text`. */
  readonly colors: readonly Rgb[];
  /** Column of the first glyph. */
  readonly column: number;
}

export interface DisplayDirectives {
  readonly indicatorA: boolean;
  readonly indicatorB: boolean;
  readonly matrix: MatrixText | null;
  readonly nodeLights: NodeActivity;
}

export type QuerySource = 'jobs' | 'nodes';

export type QueryResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly kind: QueryFailureKind };

export type QueryFailureKind = 'timeout' | 'exit' | 'spawn' | 'parse' | 'aborted';
