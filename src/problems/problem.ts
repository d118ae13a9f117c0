import type { Problem, SearchNode } from "../interfaces/interfaces";

// Defaults for the optional half of the Problem contract.

export function goalTest<S, A, G>(problem: Problem<S, A, G>, state: S): boolean {
  if (problem.isGoal) return problem.isGoal(state);
  if (problem.goal === undefined) return false;
  const key: unknown = problem.key ? problem.key(state) : state;
  return Object.is(key, problem.goal);
}

export function stepCost<S, A, G>(
  problem: Problem<S, A, G>,
  s: S,
  a: A,
  s1: S
): number {
  return problem.actionCost ? problem.actionCost(s, a, s1) : 1;
}

// Not consulted by IDDFS; kept for heuristic-guided variants.
export function heuristic<S, A, G>(
  problem: Problem<S, A, G>,
  node: SearchNode<S, A>
): number {
  return problem.h ? problem.h(node) : 0;
}
