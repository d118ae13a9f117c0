import type { PassVerdict, StopReason } from "../types/types";

// ---------- Search tree ----------

/**
 * A point in the search tree. Nodes are frozen on construction and share
 * their ancestor chain with every descendant; depth is derived from the
 * chain, never stored.
 */
export interface SearchNode<S, A> {
  readonly state: S;
  readonly parent: SearchNode<S, A> | null;
  readonly action: A | null;
  readonly pathCost: number;
}

// ---------- Problem contract ----------

/**
 * Capability set a domain supplies to the engine. Only `actions` and
 * `result` are required; defaults for the rest live in problems/problem.ts.
 */
export interface Problem<S, A, G = S> {
  readonly initial: S;
  readonly goal?: G;
  actions(state: S): readonly A[];
  result(state: S, action: A): S;
  /** Predicate goal; when absent the state (or `key(state)`) is compared to `goal`. */
  isGoal?(state: S): boolean;
  actionCost?(s: S, a: A, s1: S): number;
  h?(node: SearchNode<S, A>): number;
  /** Projection compared against `goal` by the default goal test. */
  key?(state: S): G;
}

// ---------- Outcomes ----------

export interface GoalOutcome<S, A> {
  readonly kind: "goal";
  readonly node: SearchNode<S, A>;
}

export interface Failure {
  readonly kind: "failure";
  readonly pathCost: number;
}

export interface Cutoff {
  readonly kind: "cutoff";
  readonly pathCost: number;
}

export interface BudgetExhausted {
  readonly kind: "exhausted-budget";
  readonly limit: number;
}

export type SearchOutcome<S, A> = GoalOutcome<S, A> | Failure | Cutoff;

// ---------- Run state ----------

export interface SearchMeta {
  nodesVisited: number; // popped from the frontier
  nodesExpanded: number; // had expand() called
  peakFrontier: number;
  cutoffs: number; // nodes gated by the depth bound
}

export interface PassState<S, A> {
  limit: number;
  outcome: SearchOutcome<S, A>;
  meta: SearchMeta; // this pass only
  lastRuntimeMs: number;
}

export interface SearchReport<S, A> {
  outcome: GoalOutcome<S, A> | Failure | BudgetExhausted;
  passes: number;
  finalLimit: number;
  meta: SearchMeta; // totals across passes
  runtimeMs: number;
}

export interface SearchOptions {
  startLimit?: number;
  maxLimit?: number;
}

export interface EnumerationOptions {
  minDepth?: number;
  maxResults?: number;
  maxLimit?: number;
}

export interface CollectOptions {
  minDepth: number;
  maxResults: number;
  floor?: number; // record matches only at depth >= max(minDepth, floor)
}

export interface CollectPass {
  limit: number;
  verdict: PassVerdict;
  recorded: number;
}

export interface EnumerationReport<S> {
  matches: S[];
  passes: number;
  finalLimit: number | null;
  stoppedBy: StopReason;
  meta: SearchMeta;
  runtimeMs: number;
}
