import type {
  CollectOptions,
  CollectPass,
  EnumerationOptions,
  EnumerationReport,
  Problem,
  SearchMeta,
} from "../interfaces/interfaces";
import type { PassVerdict, StopReason } from "../types/types";
import { resolveEnumerationOptions } from "../config/config";
import { goalTest } from "../problems/problem";
import { LIFOQueue } from "../utils/LIFOQueue/LIFOQueue";
import { createNode, depth, expand } from "../utils/searchNode/searchNode";
import { assertLimit, createMeta } from "./IDDFS";

/**
 * Depth-limited pass that records every matching state at
 * `depth >= max(minDepth, floor)` into `found` instead of stopping at the
 * first goal. The recording gate is independent of the expansion gate at
 * `limit`.
 *
 * Returns "complete" as soon as `found` holds `maxResults` states.
 */
export function depthLimitedCollect<S, A, G>(
  problem: Problem<S, A, G>,
  limit: number,
  options: CollectOptions,
  found: S[],
  meta: SearchMeta = createMeta()
): PassVerdict {
  assertLimit(limit);
  const { minDepth, maxResults, floor = minDepth } = options;
  if (found.length >= maxResults) return "complete";

  const gate = Math.max(minDepth, floor);
  const frontier = new LIFOQueue([createNode<S, A>(problem.initial)]);
  meta.peakFrontier = Math.max(meta.peakFrontier, frontier.size());
  let verdict: PassVerdict = "failure";

  for (let node = frontier.pop(); node !== undefined; node = frontier.pop()) {
    meta.nodesVisited++;
    const d = depth(node);

    if (d >= gate && goalTest(problem, node.state)) {
      found.push(node.state);
      if (found.length >= maxResults) return "complete";
    }

    if (d >= limit) {
      verdict = "cutoff";
      meta.cutoffs++;
      continue;
    }

    meta.nodesExpanded++;
    for (const child of expand(problem, node)) frontier.push(child);
    meta.peakFrontier = Math.max(meta.peakFrontier, frontier.size());
  }

  return verdict;
}

/**
 * Collects up to `maxResults` goal states at depth >= `minDepth`, deepening
 * from `limit = minDepth`. Each pass after the first records only the layer
 * it newly reaches, so a state is never collected twice.
 */
export function collectGoals<S, A, G>(
  problem: Problem<S, A, G>,
  options: EnumerationOptions = {},
  onPass?: (pass: CollectPass) => void
): EnumerationReport<S> {
  const { minDepth, maxResults, maxLimit } = resolveEnumerationOptions(options);
  const found: S[] = [];
  const meta = createMeta();
  const begin = performance.now();
  let passes = 0;
  let finalLimit: number | null = null;
  let stoppedBy: StopReason = "threshold";

  if (maxResults > 0) {
    stoppedBy = "budget";
    for (let limit = minDepth; limit <= maxLimit; limit++) {
      const before = found.length;
      const verdict = depthLimitedCollect(
        problem,
        limit,
        { minDepth, maxResults, floor: limit },
        found,
        meta
      );
      passes++;
      finalLimit = limit;
      onPass?.({ limit, verdict, recorded: found.length - before });

      if (verdict === "complete") {
        stoppedBy = "threshold";
        break;
      }
      if (verdict === "failure") {
        stoppedBy = "exhausted";
        break;
      }
    }
  }

  return {
    matches: found,
    passes,
    finalLimit,
    stoppedBy,
    meta,
    runtimeMs: performance.now() - begin,
  };
}
