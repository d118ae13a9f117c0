import type {
  Cutoff,
  Failure,
  GoalOutcome,
  Problem,
  SearchNode,
  SearchOutcome,
} from "../../interfaces/interfaces";
import { stepCost } from "../../problems/problem";

export function createNode<S, A>(
  state: S,
  parent: SearchNode<S, A> | null = null,
  action: A | null = null,
  pathCost = 0
): SearchNode<S, A> {
  return Object.freeze({ state, parent, action, pathCost });
}

// Number of actions from the root; 0 for the initial node.
export function depth<S, A>(node: SearchNode<S, A>): number {
  let d = 0;
  for (let cur = node.parent; cur !== null; cur = cur.parent) d++;
  return d;
}

/**
 * Lazily yields the children of `node`, one per action and in the order
 * `problem.actions` returns them.
 */
export function* expand<S, A, G>(
  problem: Problem<S, A, G>,
  node: SearchNode<S, A>
): Generator<SearchNode<S, A>, void, undefined> {
  const s = node.state;
  for (const action of problem.actions(s)) {
    const s1 = problem.result(s, action);
    yield createNode(s1, node, action, node.pathCost + stepCost(problem, s, action, s1));
  }
}

// ---------- Sentinels ----------

export const FAILURE: Failure = Object.freeze({ kind: "failure", pathCost: Infinity });
export const CUTOFF: Cutoff = Object.freeze({ kind: "cutoff", pathCost: Infinity });

export const isGoalOutcome = <S, A>(
  outcome: SearchOutcome<S, A>
): outcome is GoalOutcome<S, A> => outcome.kind === "goal";

export const isFailure = <S, A>(outcome: SearchOutcome<S, A>): outcome is Failure =>
  outcome.kind === "failure";

export const isCutoff = <S, A>(outcome: SearchOutcome<S, A>): outcome is Cutoff =>
  outcome.kind === "cutoff";
