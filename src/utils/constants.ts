// ---------- Defaults ----------

export const DEFAULT_START_LIMIT = 1;

// permission enumeration (perms command)
export const DEFAULT_MIN_DEPTH = 3;
export const DEFAULT_MAX_RESULTS = 10;
export const DEFAULT_PERMISSION = "rwxr-xr--";

// demo goals
export const DEFAULT_TREE_GOAL = 4;
export const DEFAULT_FILE_GOAL = "file_d";

export const PATH_SEPARATOR = " -> ";
