import { describe, it, expect } from "vitest";
import type { Problem } from "../../interfaces/interfaces";
import { buildUserTree, createUserSearchProblem } from "../../problems/binaryTree";
import {
  CUTOFF,
  FAILURE,
  createNode,
  depth,
  expand,
  isCutoff,
  isFailure,
  isGoalOutcome,
} from "../searchNode/searchNode";

describe("createNode", () => {
  it("builds a frozen root node", () => {
    const node = createNode<string, string>("s0");
    expect(node).toEqual({ state: "s0", parent: null, action: null, pathCost: 0 });
    expect(Object.isFrozen(node)).toBe(true);
  });

  it("derives depth from the parent chain", () => {
    const root = createNode<string, string>("a");
    const child = createNode("b", root, "a->b", 1);
    const grandchild = createNode("c", child, "b->c", 2);
    expect(depth(root)).toBe(0);
    expect(depth(child)).toBe(1);
    expect(depth(grandchild)).toBe(2);
  });
});

describe("expand", () => {
  it("yields children in action order with unit step costs", () => {
    const problem = createUserSearchProblem(buildUserTree(), 99);
    const root = createNode<typeof problem.initial, typeof problem.initial>(problem.initial);
    const children = [...expand(problem, root)];
    expect(children.map((c) => c.state.value)).toEqual([2, 3]);
    expect(children.every((c) => c.parent === root && c.pathCost === 1)).toBe(true);
    expect(children.map((c) => c.action?.value)).toEqual([2, 3]);
  });

  it("accumulates custom action costs", () => {
    const problem: Problem<number, number> = {
      initial: 0,
      actions: (s) => (s < 3 ? [1] : []),
      result: (s, a) => s + a,
      actionCost: (_s, _a, s1) => s1 * 2,
    };
    const root = createNode<number, number>(problem.initial);
    const [child] = [...expand(problem, root)];
    const [grandchild] = [...expand(problem, child)];
    expect(child.pathCost).toBe(2);
    expect(grandchild.pathCost).toBe(6);
  });

  it("is lazy", () => {
    let applied = 0;
    const problem: Problem<number, number> = {
      initial: 0,
      actions: () => [1, 2, 3],
      result: (s, a) => {
        applied++;
        return s + a;
      },
    };
    const children = expand(problem, createNode<number, number>(0));
    expect(applied).toBe(0);
    children.next();
    expect(applied).toBe(1);
  });
});

describe("sentinels", () => {
  it("carry an infinite path cost and distinct kinds", () => {
    expect(FAILURE).toEqual({ kind: "failure", pathCost: Infinity });
    expect(CUTOFF).toEqual({ kind: "cutoff", pathCost: Infinity });
    expect(Object.isFrozen(FAILURE)).toBe(true);
  });

  it("cannot be confused with a goal whose state is named like them", () => {
    const goal = { kind: "goal" as const, node: createNode<string, string>("failure") };
    expect(isGoalOutcome(goal)).toBe(true);
    expect(isFailure(goal)).toBe(false);
    expect(isFailure(FAILURE)).toBe(true);
    expect(isCutoff(CUTOFF)).toBe(true);
    expect(isCutoff(FAILURE)).toBe(false);
  });
});
