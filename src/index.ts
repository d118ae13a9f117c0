export type {
  BudgetExhausted,
  CollectOptions,
  CollectPass,
  Cutoff,
  EnumerationOptions,
  EnumerationReport,
  Failure,
  GoalOutcome,
  PassState,
  Problem,
  SearchMeta,
  SearchNode,
  SearchOptions,
  SearchOutcome,
  SearchReport,
} from "./interfaces/interfaces";
export type { PassVerdict, StopReason } from "./types/types";

export {
  algoIDDFS,
  depthLimitedSearch,
  iterativeDeepeningSearch,
  runIDDFS,
} from "./algorithms/IDDFS";
export { collectGoals, depthLimitedCollect } from "./algorithms/boundedEnumeration";
export {
  CUTOFF,
  FAILURE,
  createNode,
  depth,
  expand,
  isCutoff,
  isFailure,
  isGoalOutcome,
} from "./utils/searchNode/searchNode";
export { goalTest, heuristic, stepCost } from "./problems/problem";
export { formatPath, pathActions, pathNodes, pathStates, replayActions } from "./utils/utils";

export { BinaryTreeNode, buildUserTree, createUserSearchProblem } from "./problems/binaryTree";
export { TreeNode, buildFileTree, createFileSearchProblem, routeTo } from "./problems/fileTree";
export {
  createPermissionSearchProblem,
  formatPermissionBits,
  parsePermissionString,
  type FsNode,
} from "./problems/permissions";

export { CliUsageError, SearchConfigError, SearchError } from "./errors/errors";
