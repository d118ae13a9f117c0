// experiments/experiment-runner.ts
//
// Offline experiments for the IDDFS engine.
// Runs iterative deepening on many seeded random trees, once for a goal that
// exists and once for one that does not, and writes a CSV file with passes,
// final limit, visits, expansions, frontier size and timings.
//
// Run with:
//   npm run experiment
//
// CSV output: experiments/results.csv

import { writeFileSync } from "node:fs";
import { runIDDFS } from "../src/algorithms/IDDFS";
import { experimentConfigSchema, validate, type ExperimentConfig } from "../src/config/config";
import { createFileSearchProblem } from "../src/problems/fileTree";
import { createLogger } from "../src/utils/logger";
import { generateRandomTree, pickGoal, type GeneratedTree } from "../src/utils/treeGen/treeGen";

interface TrialResult {
  goal: string;
  goalDepth: number | null; // null when the goal is absent
  found: boolean;
  passes: number;
  finalLimit: number;
  nodesVisited: number;
  nodesExpanded: number;
  peakFrontier: number;
  runtimeMs: number;
}

// ---------- Experiment parameters (EDIT THESE AS YOU LIKE) ----------
const PARAMS = {
  outputCsv: "experiments/results.csv",
  // how many seeds per configuration
  trials: 50,
  branchings: [2, 3, 4],
  depths: [4, 6, 8],
};

const MISSING_GOAL = "absent";

const logger = createLogger("experiment");

function runTrial(tree: GeneratedTree, goal: string): TrialResult {
  const report = runIDDFS(createFileSearchProblem(tree.root, goal));
  return {
    goal,
    goalDepth: tree.depthOf.get(goal) ?? null,
    found: report.outcome.kind === "goal",
    passes: report.passes,
    finalLimit: report.finalLimit,
    nodesVisited: report.meta.nodesVisited,
    nodesExpanded: report.meta.nodesExpanded,
    peakFrontier: report.meta.peakFrontier,
    runtimeMs: report.runtimeMs,
  };
}

// ---------- Main experiment loop ----------
function main(config: ExperimentConfig) {
  const rows: string[] = [];
  rows.push(
    [
      "trial",
      "branching",
      "depth",
      "nodes",
      "goal",
      "goalDepth",
      "found",
      "passes",
      "finalLimit",
      "nodesVisited",
      "nodesExpanded",
      "peakFrontier",
      "runtimeMs",
    ].join(",")
  );

  let trialIndex = 0;

  for (const branching of config.branchings) {
    for (const depth of config.depths) {
      for (let t = 0; t < config.trials; t++) {
        const seed = config.seed * trialIndex + t;
        const tree = generateRandomTree({ branching, depth, seed });

        for (const goal of [pickGoal(tree, seed), MISSING_GOAL]) {
          const r = runTrial(tree, goal);
          rows.push(
            [
              trialIndex.toString(),
              branching.toString(),
              depth.toString(),
              tree.size.toString(),
              r.goal,
              r.goalDepth == null ? "" : r.goalDepth.toString(),
              r.found ? "1" : "0",
              r.passes.toString(),
              r.finalLimit.toString(),
              r.nodesVisited.toString(),
              r.nodesExpanded.toString(),
              r.peakFrontier.toString(),
              r.runtimeMs.toFixed(4),
            ].join(",")
          );
        }

        trialIndex++;
        logger.info(
          `Done trial ${trialIndex} :: branching=${branching}, depth=${depth}, nodes=${tree.size}, seed=${seed}`
        );
      }
    }
  }

  writeFileSync(config.outputCsv, rows.join("\n"), "utf8");
  logger.info(`✅ Wrote ${rows.length - 1} rows to ${config.outputCsv}`);
}

const parsed = validate(experimentConfigSchema, PARAMS);
if (!parsed.success || parsed.data === undefined) {
  logger.error(`invalid experiment parameters: ${parsed.error ?? "unknown"}`);
  process.exitCode = 2;
} else {
  main(parsed.data);
}
