import { describe, it, expect } from "vitest";
import type { PassState, Problem } from "../../interfaces/interfaces";
import { SearchConfigError } from "../../errors/errors";
import {
  BinaryTreeNode,
  buildUserTree,
  createUserSearchProblem,
} from "../../problems/binaryTree";
import {
  TreeNode,
  buildFileTree,
  createFileSearchProblem,
  routeTo,
} from "../../problems/fileTree";
import { CUTOFF, FAILURE, depth } from "../../utils/searchNode/searchNode";
import { generateRandomTree, pickGoal } from "../../utils/treeGen/treeGen";
import { pathActions, pathStates, replayActions } from "../../utils/utils";
import {
  algoIDDFS,
  createMeta,
  depthLimitedSearch,
  iterativeDeepeningSearch,
  runIDDFS,
} from "../IDDFS";

const predicateProblem = (
  root: TreeNode,
  isGoal: (s: TreeNode) => boolean
): Problem<TreeNode, TreeNode, string> => ({
  initial: root,
  actions: (s) => s.children,
  result: (_s, a) => a,
  isGoal,
});

describe("iterativeDeepeningSearch", () => {
  it("finds user 4 in the demo tree", () => {
    const result = iterativeDeepeningSearch(createUserSearchProblem(buildUserTree(), 4));
    expect(result.kind).toBe("goal");
    if (result.kind !== "goal") return;
    expect(result.node.state.value).toBe(4);
    expect(depth(result.node)).toBe(3);
    expect(pathStates(result.node).map((s) => s.value)).toEqual([1, 3, 9, 4]);
  });

  it("returns FAILURE for a user that does not exist", () => {
    expect(iterativeDeepeningSearch(createUserSearchProblem(buildUserTree(), 99))).toBe(
      FAILURE
    );
  });

  it("reconstructs the route to file_d", () => {
    const result = iterativeDeepeningSearch(createFileSearchProblem(buildFileTree(), "file_d"));
    if (result.kind !== "goal") throw new Error("expected a goal");
    expect(routeTo(result.node)).toBe("root -> subdir_1 -> subdir_3 -> file_d");
  });

  it("visits siblings in reverse action order", () => {
    const root = new TreeNode("root").addChildren(
      new TreeNode("goal_left"),
      new TreeNode("goal_right")
    );
    const result = iterativeDeepeningSearch(
      predicateProblem(root, (s) => s.name.startsWith("goal"))
    );
    if (result.kind !== "goal") throw new Error("expected a goal");
    expect(result.node.state.name).toBe("goal_right");
  });

  it("replaying the reconstructed actions reproduces the found state", () => {
    const problem = createUserSearchProblem(buildUserTree(), 8);
    const result = iterativeDeepeningSearch(problem);
    if (result.kind !== "goal") throw new Error("expected a goal");
    const actions = pathActions(result.node);
    expect(actions.map((a) => a.value)).toEqual([2, 6, 8]);
    expect(replayActions(problem, actions)).toBe(result.node.state);
  });

  it("agrees with the tree contents on random trees", () => {
    for (let seed = 1; seed <= 25; seed++) {
      const tree = generateRandomTree({ branching: 3, depth: 5, seed });
      const goal = pickGoal(tree, seed);
      const goalDepth = tree.depthOf.get(goal);
      if (goalDepth === undefined) throw new Error(`goal ${goal} not in tree`);

      const hit = runIDDFS(createFileSearchProblem(tree.root, goal));
      if (hit.outcome.kind !== "goal") throw new Error(`seed ${seed}: goal not found`);
      expect(hit.outcome.node.state.name).toBe(goal);
      expect(depth(hit.outcome.node)).toBe(goalDepth);
      expect(hit.finalLimit).toBe(Math.max(1, goalDepth));
      expect(hit.passes).toBe(Math.max(1, goalDepth));

      const miss = runIDDFS(createFileSearchProblem(tree.root, "absent"));
      expect(miss.outcome).toBe(FAILURE);
      expect(miss.finalLimit).toBe(tree.deepest + 1);
    }
  });
});

describe("depthLimitedSearch", () => {
  it("returns CUTOFF at limit 0 for a non-goal root with children", () => {
    expect(depthLimitedSearch(createUserSearchProblem(buildUserTree(), 99), 0)).toBe(CUTOFF);
  });

  it("returns a goal root regardless of the limit", () => {
    for (const limit of [0, 1, 5]) {
      const result = depthLimitedSearch(createUserSearchProblem(buildUserTree(), 1), limit);
      if (result.kind !== "goal") throw new Error("expected a goal");
      expect(result.node.state.value).toBe(1);
      expect(result.node.parent).toBeNull();
    }
  });

  it("does not find a goal deeper than the limit", () => {
    expect(depthLimitedSearch(createUserSearchProblem(buildUserTree(), 4), 2)).toBe(CUTOFF);
  });

  it("never expands a node at the depth bound", () => {
    const base = createUserSearchProblem(buildUserTree(), 99);
    const expanded: number[] = [];
    const problem = {
      ...base,
      actions(state: BinaryTreeNode<number>) {
        expanded.push(state.value);
        return base.actions(state);
      },
    };
    depthLimitedSearch(problem, 2);
    expect(expanded).toEqual([1, 3, 2]);
  });

  it("returns FAILURE once the bound exceeds the deepest node", () => {
    expect(depthLimitedSearch(createUserSearchProblem(buildUserTree(), 99), 10)).toBe(FAILURE);
  });

  it("counts visits, expansions and cutoffs", () => {
    const meta = createMeta();
    const result = depthLimitedSearch(createUserSearchProblem(buildUserTree(), 99), 1, meta);
    expect(result).toBe(CUTOFF);
    expect(meta).toEqual({ nodesVisited: 3, nodesExpanded: 1, peakFrontier: 2, cutoffs: 2 });
  });

  it("rejects negative and fractional limits", () => {
    const problem = createUserSearchProblem(buildUserTree(), 4);
    expect(() => depthLimitedSearch(problem, -1)).toThrow(SearchConfigError);
    expect(() => depthLimitedSearch(problem, 1.5)).toThrow(SearchConfigError);
  });
});

describe("algoIDDFS", () => {
  it("yields one state per bounded pass", () => {
    const passes: PassState<BinaryTreeNode<number>, BinaryTreeNode<number>>[] = [];
    const report = runIDDFS(createUserSearchProblem(buildUserTree(), 4), {}, (p) =>
      passes.push(p)
    );

    expect(passes.map((p) => p.limit)).toEqual([1, 2, 3]);
    expect(passes.map((p) => p.outcome.kind)).toEqual(["cutoff", "cutoff", "goal"]);
    expect(passes.map((p) => p.meta.nodesVisited)).toEqual([3, 7, 5]);
    expect(report.passes).toBe(3);
    expect(report.finalLimit).toBe(3);
    expect(report.meta).toEqual({
      nodesVisited: 15,
      nodesExpanded: 8,
      peakFrontier: 3,
      cutoffs: 6,
    });
  });

  it("stops at maxLimit without claiming failure", () => {
    const report = runIDDFS(createUserSearchProblem(buildUserTree(), 99), { maxLimit: 2 });
    expect(report.outcome).toEqual({ kind: "exhausted-budget", limit: 2 });
    expect(report.passes).toBe(2);
    expect(report.finalLimit).toBe(2);
  });

  it("starts from startLimit", () => {
    const report = runIDDFS(createUserSearchProblem(buildUserTree(), 4), { startLimit: 3 });
    expect(report.outcome.kind).toBe("goal");
    expect(report.passes).toBe(1);
  });

  it("can be stopped between passes", () => {
    const limits: number[] = [];
    for (const pass of algoIDDFS(createUserSearchProblem(buildUserTree(), 99))) {
      limits.push(pass.limit);
      if (limits.length === 2) break;
    }
    expect(limits).toEqual([1, 2]);
  });

  it("rejects a startLimit above maxLimit", () => {
    const problem = createUserSearchProblem(buildUserTree(), 4);
    expect(() => runIDDFS(problem, { startLimit: 5, maxLimit: 2 })).toThrow(SearchConfigError);
  });
});
