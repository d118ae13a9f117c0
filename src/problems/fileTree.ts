import type { Problem, SearchNode } from "../interfaces/interfaces";
import { formatPath, pathStates } from "../utils/utils";

export class TreeNode {
  readonly children: TreeNode[] = [];
  constructor(public readonly name: string) {}

  addChild(child: TreeNode) {
    this.children.push(child);
    return this;
  }

  addChildren(...children: TreeNode[]) {
    for (const child of children) this.addChild(child);
    return this;
  }

  toString() {
    return `<${this.name}>`;
  }
}

export type FileTreeProblem = Problem<TreeNode, TreeNode, string>;

// Children are offered in insertion order; the goal is an exact name match.
export function createFileSearchProblem(root: TreeNode, goalName: string): FileTreeProblem {
  return {
    initial: root,
    goal: goalName,
    actions: (state) => state.children,
    result: (_state, action) => action,
    key: (state) => state.name,
  };
}

export const routeTo = (node: SearchNode<TreeNode, TreeNode>) =>
  formatPath(pathStates(node).map((s) => s.name));

// root -> {subdir_1, subdir_2}; subdir_1 -> {file_a, subdir_3};
// subdir_3 -> {file_b, file_d}; subdir_2 -> {file_c}
export function buildFileTree(): TreeNode {
  const root = new TreeNode("root");
  const subdir1 = new TreeNode("subdir_1");
  const subdir2 = new TreeNode("subdir_2");
  const subdir3 = new TreeNode("subdir_3");

  root.addChildren(subdir1, subdir2);
  subdir1.addChildren(new TreeNode("file_a"), subdir3);
  subdir3.addChildren(new TreeNode("file_b"), new TreeNode("file_d"));
  subdir2.addChild(new TreeNode("file_c"));
  return root;
}
