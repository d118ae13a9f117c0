import type { Problem, SearchNode } from "../interfaces/interfaces";
import { PATH_SEPARATOR } from "./constants";

// Deterministic RNG, 32-bit LCG
export function* rngLCG(seed: number): Generator<number, never, void> {
  let s = seed >>> 0 || 1;
  while (true) {
    s = (1664525 * s + 1013904223) >>> 0;
    yield s / 2 ** 32;
  }
}

// ---------- Path reconstruction ----------

// Root-to-node chain, by walking parents and reversing.
export function pathNodes<S, A>(node: SearchNode<S, A>): SearchNode<S, A>[] {
  const path: SearchNode<S, A>[] = [];
  for (let cur: SearchNode<S, A> | null = node; cur !== null; cur = cur.parent) {
    path.push(cur);
  }
  return path.reverse();
}

export const pathStates = <S, A>(node: SearchNode<S, A>): S[] =>
  pathNodes(node).map((n) => n.state);

// The root carries no action, so this is one shorter than pathStates.
export function pathActions<S, A>(node: SearchNode<S, A>): A[] {
  const actions: A[] = [];
  for (const n of pathNodes(node)) {
    if (n.parent !== null && n.action !== null) actions.push(n.action);
  }
  return actions;
}

// Applies `actions` from the initial state.
export function replayActions<S, A, G>(
  problem: Problem<S, A, G>,
  actions: readonly A[]
): S {
  let s = problem.initial;
  for (const a of actions) s = problem.result(s, a);
  return s;
}

export const formatPath = (labels: readonly string[]) => labels.join(PATH_SEPARATOR);
