import type {
  Cutoff,
  Failure,
  GoalOutcome,
  PassState,
  Problem,
  SearchMeta,
  SearchOptions,
  SearchOutcome,
  SearchReport,
} from "../interfaces/interfaces";
import { resolveSearchOptions } from "../config/config";
import { SearchConfigError } from "../errors/errors";
import { goalTest } from "../problems/problem";
import { LIFOQueue } from "../utils/LIFOQueue/LIFOQueue";
import { CUTOFF, FAILURE, createNode, depth, expand } from "../utils/searchNode/searchNode";

export const createMeta = (): SearchMeta => ({
  nodesVisited: 0,
  nodesExpanded: 0,
  peakFrontier: 0,
  cutoffs: 0,
});

export function mergeMeta(total: SearchMeta, pass: SearchMeta): SearchMeta {
  total.nodesVisited += pass.nodesVisited;
  total.nodesExpanded += pass.nodesExpanded;
  total.peakFrontier = Math.max(total.peakFrontier, pass.peakFrontier);
  total.cutoffs += pass.cutoffs;
  return total;
}

export function assertLimit(limit: number) {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new SearchConfigError(
      "INVALID_LIMIT",
      `limit must be a non-negative integer, got ${limit}`
    );
  }
}

/**
 * One bounded depth-first pass over an explicit stack.
 *
 * Children are pushed in `actions` order, so siblings are visited right to
 * left: the last action returned is explored first. Nodes at `depth >= limit`
 * are goal-tested but never expanded.
 *
 * Returns the first goal node met, `CUTOFF` when the bound pruned at least
 * one node, and `FAILURE` when the whole space was exhausted.
 */
export function depthLimitedSearch<S, A, G>(
  problem: Problem<S, A, G>,
  limit: number,
  meta: SearchMeta = createMeta()
): SearchOutcome<S, A> {
  assertLimit(limit);
  const frontier = new LIFOQueue([createNode<S, A>(problem.initial)]);
  meta.peakFrontier = Math.max(meta.peakFrontier, frontier.size());
  let result: Failure | Cutoff = FAILURE;

  for (let node = frontier.pop(); node !== undefined; node = frontier.pop()) {
    meta.nodesVisited++;

    if (goalTest(problem, node.state)) return { kind: "goal", node };

    if (depth(node) >= limit) {
      result = CUTOFF;
      meta.cutoffs++;
      continue;
    }

    meta.nodesExpanded++;
    for (const child of expand(problem, node)) frontier.push(child);
    meta.peakFrontier = Math.max(meta.peakFrontier, frontier.size());
  }

  return result;
}

/**
 * Runs depth-limited passes with limit 1, 2, 3, ... until a pass returns
 * something other than `CUTOFF`. Does not terminate on an infinite space
 * without a goal; use `algoIDDFS` with `maxLimit` to cap the schedule.
 */
export function iterativeDeepeningSearch<S, A, G>(
  problem: Problem<S, A, G>
): GoalOutcome<S, A> | Failure {
  for (let limit = 1; ; limit++) {
    const result = depthLimitedSearch(problem, limit);
    if (result.kind !== "cutoff") return result;
  }
}

/**
 * Pass-by-pass form of the driver. Yields after every bounded pass so the
 * caller can watch or stop the schedule, and returns the final report.
 */
export function* algoIDDFS<S, A, G>(
  problem: Problem<S, A, G>,
  options: SearchOptions = {}
): Generator<PassState<S, A>, SearchReport<S, A>, void> {
  const { startLimit, maxLimit } = resolveSearchOptions(options);
  const meta = createMeta();
  const begin = performance.now();
  let passes = 0;

  for (let limit = startLimit; limit <= maxLimit; limit++) {
    const passBegin = performance.now();
    const passMeta = createMeta();
    const outcome = depthLimitedSearch(problem, limit, passMeta);
    mergeMeta(meta, passMeta);
    passes++;

    yield {
      limit,
      outcome,
      meta: passMeta,
      lastRuntimeMs: performance.now() - passBegin,
    };

    if (outcome.kind !== "cutoff") {
      return {
        outcome,
        passes,
        finalLimit: limit,
        meta,
        runtimeMs: performance.now() - begin,
      };
    }
  }

  return {
    outcome: { kind: "exhausted-budget", limit: maxLimit },
    passes,
    finalLimit: maxLimit,
    meta,
    runtimeMs: performance.now() - begin,
  };
}

export function runIDDFS<S, A, G>(
  problem: Problem<S, A, G>,
  options: SearchOptions = {},
  onPass?: (pass: PassState<S, A>) => void
): SearchReport<S, A> {
  const it = algoIDDFS(problem, options);
  for (let step = it.next(); ; step = it.next()) {
    if (step.done) return step.value;
    onPass?.(step.value);
  }
}
