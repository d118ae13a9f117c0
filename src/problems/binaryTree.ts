import type { Problem } from "../interfaces/interfaces";

export class BinaryTreeNode<T> {
  constructor(
    public value: T,
    public left: BinaryTreeNode<T> | null = null,
    public right: BinaryTreeNode<T> | null = null
  ) {}

  addChildren(left: BinaryTreeNode<T> | null, right: BinaryTreeNode<T> | null) {
    this.left = left;
    this.right = right;
    return this;
  }

  toString() {
    return `<${String(this.value)}>`;
  }
}

export type TreeProblem<T> = Problem<BinaryTreeNode<T>, BinaryTreeNode<T>, T>;

/**
 * Does a user with id `goal` exist in the tree? Moves go to the left child,
 * then the right one, when present.
 */
export function createUserSearchProblem<T>(
  root: BinaryTreeNode<T>,
  goal: T
): TreeProblem<T> {
  return {
    initial: root,
    goal,
    actions(state) {
      const moves: BinaryTreeNode<T>[] = [];
      if (state.left) moves.push(state.left);
      if (state.right) moves.push(state.right);
      return moves;
    },
    result: (_state, action) => action,
    key: (state) => state.value,
  };
}

// 1 -> {2, 3}; 2 -> {6, 7}; 6 -> {8}; 3 -> {9, 5}; 9 -> right 4
export function buildUserTree(): BinaryTreeNode<number> {
  const root = new BinaryTreeNode(1);
  const left = new BinaryTreeNode(2);
  const right = new BinaryTreeNode(3);
  root.addChildren(left, right);

  left.addChildren(new BinaryTreeNode(6, new BinaryTreeNode(8)), new BinaryTreeNode(7));
  right.addChildren(
    new BinaryTreeNode(9, null, new BinaryTreeNode(4)),
    new BinaryTreeNode(5)
  );
  return root;
}
