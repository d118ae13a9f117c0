import { TreeNode } from "../../problems/fileTree";
import { rngLCG } from "../utils";

export interface RandomTreeConfig {
  branching: number; // max children per node
  depth: number; // max depth of any node
  seed: number;
}

export interface GeneratedTree {
  root: TreeNode;
  size: number;
  deepest: number;
  depthOf: Map<string, number>; // name -> depth, names are unique
}

// ---------- Random tree generation ----------

/**
 * Seeded random tree. Nodes are named n0, n1, ... in creation order; every
 * node above `depth` gets between 0 and `branching` children, except the
 * root, which gets at least one when `depth > 0`.
 */
export function generateRandomTree({ branching, depth, seed }: RandomTreeConfig): GeneratedTree {
  const R = rngLCG(seed);
  const root = new TreeNode("n0");
  const depthOf = new Map<string, number>([["n0", 0]]);
  let size = 1;
  let deepest = 0;

  const stack: { node: TreeNode; d: number }[] = [{ node: root, d: 0 }];
  for (let cur = stack.pop(); cur !== undefined; cur = stack.pop()) {
    if (cur.d >= depth) continue;

    let k = Math.floor(R.next().value * (branching + 1));
    if (cur.d === 0) k = Math.max(k, 1);

    for (let i = 0; i < k; i++) {
      const child = new TreeNode(`n${size}`);
      size++;
      cur.node.addChild(child);
      depthOf.set(child.name, cur.d + 1);
      deepest = Math.max(deepest, cur.d + 1);
      stack.push({ node: child, d: cur.d + 1 });
    }
  }

  return { root, size, deepest, depthOf };
}

// Picks a node name uniformly, deterministically per seed.
export function pickGoal(tree: GeneratedTree, seed: number): string {
  const R = rngLCG(seed + 4242);
  const index = Math.floor(R.next().value * tree.size);
  return `n${index}`;
}
