import { z } from "zod";
import { SearchConfigError } from "../errors/errors";
import {
  DEFAULT_FILE_GOAL,
  DEFAULT_MAX_RESULTS,
  DEFAULT_MIN_DEPTH,
  DEFAULT_PERMISSION,
  DEFAULT_START_LIMIT,
  DEFAULT_TREE_GOAL,
} from "../utils/constants";

export interface ZodValidationResult<T> {
  success: boolean;
  data?: T;
  error?: string;
}

const depthBound = z.number().int().min(0);
const unboundedDepth = z.union([depthBound, z.literal(Infinity)]);
// argv integers; blank input is rejected before coercion would turn it into 0
const argvInt = (schema: z.ZodNumber) =>
  z.string().trim().min(1, "expected an integer").pipe(schema);

const permissionString = z
  .string()
  .regex(/^([r-][w-][x-]){3}$/, "expected a symbolic mode such as rwxr-xr--");

// ---------- Driver options ----------

export const searchOptionsSchema = z
  .object({
    startLimit: depthBound.default(DEFAULT_START_LIMIT),
    maxLimit: unboundedDepth.default(Infinity),
  })
  .refine((o) => o.startLimit <= o.maxLimit, {
    message: "startLimit must not exceed maxLimit",
    path: ["startLimit"],
  });

export const enumerationOptionsSchema = z
  .object({
    minDepth: depthBound.default(DEFAULT_MIN_DEPTH),
    maxResults: depthBound.default(DEFAULT_MAX_RESULTS),
    maxLimit: unboundedDepth.default(Infinity),
  })
  .refine((o) => o.minDepth <= o.maxLimit, {
    message: "minDepth must not exceed maxLimit",
    path: ["minDepth"],
  });

export type ResolvedSearchOptions = z.output<typeof searchOptionsSchema>;
export type ResolvedEnumerationOptions = z.output<typeof enumerationOptionsSchema>;

// ---------- CLI ----------

const flags = {
  stats: z.boolean().default(false),
  verbose: z.boolean().default(false),
  quiet: z.boolean().default(false),
};

export const cliConfigSchema = z.discriminatedUnion("command", [
  z.object({
    command: z.literal("tree"),
    goal: argvInt(z.coerce.number().int()).default(String(DEFAULT_TREE_GOAL)),
    ...flags,
  }),
  z.object({
    command: z.literal("files"),
    goal: z.string().min(1).default(DEFAULT_FILE_GOAL),
    ...flags,
  }),
  z.object({
    command: z.literal("perms"),
    root: z.string().min(1, "--root is required"),
    mode: permissionString.default(DEFAULT_PERMISSION),
    minDepth: argvInt(z.coerce.number().int().min(0)).default(String(DEFAULT_MIN_DEPTH)),
    maxResults: argvInt(z.coerce.number().int().min(1)).default(String(DEFAULT_MAX_RESULTS)),
    ...flags,
  }),
]);

export type CliConfig = z.output<typeof cliConfigSchema>;

// ---------- Experiments ----------

export const experimentConfigSchema = z.object({
  outputCsv: z.string().min(1),
  trials: z.number().int().min(1),
  branchings: z.array(z.number().int().min(1).max(8)).nonempty(),
  depths: z.array(z.number().int().min(0).max(12)).nonempty(),
  seed: z.number().int().default(1000),
});

export type ExperimentConfig = z.output<typeof experimentConfigSchema>;

// ---------- Helpers ----------

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => {
      const pathStr = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      return `${pathStr}${issue.message}`;
    })
    .join("; ");

export function validate<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): ZodValidationResult<z.output<S>> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: formatIssues(result.error) };
}

function resolveOrThrow<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new SearchConfigError("INVALID_OPTIONS", formatIssues(result.error));
  }
  return result.data;
}

export const resolveSearchOptions = (options: unknown = {}): ResolvedSearchOptions =>
  resolveOrThrow(searchOptionsSchema, options);

export const resolveEnumerationOptions = (
  options: unknown = {}
): ResolvedEnumerationOptions => resolveOrThrow(enumerationOptionsSchema, options);
