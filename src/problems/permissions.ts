import { lstatSync, readdirSync, type Stats } from "node:fs";
import { join } from "node:path";
import type { Problem } from "../interfaces/interfaces";
import { SearchConfigError } from "../errors/errors";
import { DEFAULT_PERMISSION } from "../utils/constants";

export interface FsNode {
  readonly path: string;
}

export type PermissionProblem = Problem<FsNode, FsNode, never>;

const RWX = ["r", "w", "x"] as const;

// "rwxr-xr--" -> 0o754
export function parsePermissionString(mode: string): number {
  if (!/^([r-][w-][x-]){3}$/.test(mode)) {
    throw new SearchConfigError("INVALID_OPTIONS", `not a symbolic mode: ${mode}`);
  }
  let bits = 0;
  for (let i = 0; i < 9; i++) {
    bits = (bits << 1) | (mode[i] === "-" ? 0 : 1);
  }
  return bits;
}

export function formatPermissionBits(bits: number): string {
  let out = "";
  for (let i = 8; i >= 0; i--) {
    out += bits & (1 << i) ? RWX[(8 - i) % 3] : "-";
  }
  return out;
}

const errnoCode = (err: unknown): string | undefined =>
  err instanceof Error && "code" in err && typeof err.code === "string"
    ? err.code
    : undefined;

// Any fs failure carrying an errno code makes the path unreadable, not the search.
// Errors without one are bugs and propagate.
function statOrNull(path: string): Stats | null {
  try {
    return lstatSync(path);
  } catch (err) {
    if (errnoCode(err) !== undefined) return null;
    throw err;
  }
}

function listEntries(path: string): string[] {
  try {
    return readdirSync(path).sort();
  } catch (err) {
    if (errnoCode(err) !== undefined) return [];
    throw err;
  }
}

/**
 * Live filesystem below `root`: every directory entry is an action, and a
 * goal is a regular file whose permission bits equal `mode`. Symlinks are
 * neither followed nor matched. Entries are offered sorted by name.
 */
export function createPermissionSearchProblem(
  root: string,
  mode: string = DEFAULT_PERMISSION
): PermissionProblem {
  const target = parsePermissionString(mode);
  return {
    initial: { path: root },
    actions(state) {
      const stats = statOrNull(state.path);
      if (stats === null || !stats.isDirectory()) return [];
      return listEntries(state.path).map((name) => ({ path: join(state.path, name) }));
    },
    result: (_state, action) => action,
    isGoal(state) {
      const stats = statOrNull(state.path);
      return stats !== null && stats.isFile() && (stats.mode & 0o777) === target;
    },
  };
}
