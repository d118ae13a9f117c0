import type { SearchMeta } from "../interfaces/interfaces";
import { collectGoals } from "../algorithms/boundedEnumeration";
import { runIDDFS } from "../algorithms/IDDFS";
import { cliConfigSchema, validate, type CliConfig } from "../config/config";
import { CliUsageError, isSearchError } from "../errors/errors";
import { buildUserTree, createUserSearchProblem } from "../problems/binaryTree";
import { buildFileTree, createFileSearchProblem, routeTo } from "../problems/fileTree";
import { createPermissionSearchProblem } from "../problems/permissions";
import { createLogger, type LogSink, type Logger } from "../utils/logger";

export const EXIT_OK = 0;
export const EXIT_USAGE = 2;

export interface CliIO {
  out: (line: string) => void;
  err: LogSink;
}

const defaultIO: CliIO = {
  out: (line) => console.log(line),
  err: console,
};

export const USAGE = `Usage: iddfs-lab <command> [options]

Commands:
  tree   [--goal N]        look up a user id in the demo binary tree
  files  [--goal NAME]     print the route to a file in the demo file tree
  perms  --root DIR [--mode rwxr-xr--] [--min-depth 3] [--max-results 10]
                           list files below DIR with exactly these permissions

Options:
  --stats      print pass and node counters after the answer
  --verbose    log every bounded pass to stderr
  --quiet      suppress diagnostics
  -h, --help   show this message`;

const VALUE_FLAGS: Record<string, string> = {
  "--goal": "goal",
  "--root": "root",
  "--mode": "mode",
  "--min-depth": "minDepth",
  "--max-results": "maxResults",
};

const BOOLEAN_FLAGS: Record<string, string> = {
  "--stats": "stats",
  "--verbose": "verbose",
  "--quiet": "quiet",
};

/**
 * Turns argv into a raw record for `cliConfigSchema`. Only the shape is
 * checked here; values are validated by the schema.
 */
export function parseArgs(argv: readonly string[]): Record<string, unknown> {
  const raw: Record<string, unknown> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--help" || arg === "-h") {
      raw.help = true;
    } else if (Object.hasOwn(VALUE_FLAGS, arg)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new CliUsageError(`${arg} expects a value`);
      }
      raw[VALUE_FLAGS[arg]] = value;
      i++;
    } else if (Object.hasOwn(BOOLEAN_FLAGS, arg)) {
      raw[BOOLEAN_FLAGS[arg]] = true;
    } else if (arg.startsWith("-")) {
      throw new CliUsageError(`unknown option: ${arg}`);
    } else if (raw.command === undefined) {
      raw.command = arg;
    } else {
      throw new CliUsageError(`unexpected argument: ${arg}`);
    }
  }

  return raw;
}

export const formatStats = (passes: number, finalLimit: number | null, meta: SearchMeta) =>
  [
    `passes=${passes}`,
    `finalLimit=${finalLimit ?? "-"}`,
    `visited=${meta.nodesVisited}`,
    `expanded=${meta.nodesExpanded}`,
    `cutoffs=${meta.cutoffs}`,
    `peakFrontier=${meta.peakFrontier}`,
  ].join(" ");

function execute(config: CliConfig, io: CliIO, logger: Logger) {
  switch (config.command) {
    case "tree": {
      const problem = createUserSearchProblem(buildUserTree(), config.goal);
      const report = runIDDFS(problem, {}, (pass) =>
        logger.debug(`limit=${pass.limit} -> ${pass.outcome.kind} (${pass.meta.nodesVisited} visited)`)
      );
      io.out(String(report.outcome.kind === "goal"));
      if (config.stats) io.out(formatStats(report.passes, report.finalLimit, report.meta));
      return;
    }
    case "files": {
      const problem = createFileSearchProblem(buildFileTree(), config.goal);
      const report = runIDDFS(problem, {}, (pass) =>
        logger.debug(`limit=${pass.limit} -> ${pass.outcome.kind} (${pass.meta.nodesVisited} visited)`)
      );
      io.out(report.outcome.kind === "goal" ? routeTo(report.outcome.node) : "false");
      if (config.stats) io.out(formatStats(report.passes, report.finalLimit, report.meta));
      return;
    }
    case "perms": {
      const problem = createPermissionSearchProblem(config.root, config.mode);
      const report = collectGoals(
        problem,
        { minDepth: config.minDepth, maxResults: config.maxResults },
        (pass) => logger.debug(`limit=${pass.limit} -> ${pass.verdict} (+${pass.recorded})`)
      );
      if (report.matches.length === 0) {
        io.out("No matches found.");
      } else {
        for (const match of report.matches) io.out(match.path);
      }
      if (config.stats) io.out(formatStats(report.passes, report.finalLimit, report.meta));
      logger.debug(`stopped by ${report.stoppedBy} after ${report.runtimeMs.toFixed(1)}ms`);
      return;
    }
  }
}

export function runCli(argv: readonly string[], io: CliIO = defaultIO): number {
  let raw: Record<string, unknown>;
  try {
    raw = parseArgs(argv);
  } catch (err) {
    if (!isSearchError(err)) throw err;
    io.err.error(`error: ${err.message}`);
    io.err.error(USAGE);
    return EXIT_USAGE;
  }

  if (raw.help === true) {
    io.out(USAGE);
    return EXIT_OK;
  }

  const { success, data, error } = validate(cliConfigSchema, raw);
  if (!success || data === undefined) {
    io.err.error(`error: ${error ?? "invalid arguments"}`);
    io.err.error(USAGE);
    return EXIT_USAGE;
  }

  const logger = createLogger(data.command, {
    verbose: data.verbose,
    quiet: data.quiet,
    sink: io.err,
  });

  try {
    execute(data, io, logger);
  } catch (err) {
    if (!isSearchError(err)) throw err;
    logger.error(err.message);
    return EXIT_USAGE;
  }
  return EXIT_OK;
}
