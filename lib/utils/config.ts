import { z } from "zod";
import { ConfigError, MissingCredentialError } from "../domain/errors";

export const DEFAULT_BASE_URL = "https://qiita.com";
export const DEFAULT_DIFF_COMMAND = "icdiff";

export const ENV = {
  token: "QIITA_TOKEN",
  baseUrl: "QIITA_BASE_URL",
  diffCommand: "QIITA_DIFF_COMMAND",
} as const;

export interface QiitaCfg {
  baseUrl: string; // https://qiita.com
  token: string; // personal access token with write_qiita scope
}

/** Raw commander option values, as parsed from argv. */
export const CliOptionsSchema = z.object({
  dryRun: z.boolean().default(false),
  qiitaToken: z.string().optional(),
  baseUrl: z.string().optional(),
  diffCommand: z.string().optional(),
  quiet: z.boolean().default(false),
  verbose: z.number().int().nonnegative().default(0),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

const RunConfigSchema = z.object({
  path: z.string().min(1),
  token: z.string().min(1),
  baseUrl: z.string().url(),
  diffCommand: z.string().trim().min(1),
  dryRun: z.boolean(),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

export type Env = Record<string, string | undefined>;

/** An empty flag or variable counts as unset. */
const firstSet = (...values: (string | undefined)[]): string | undefined =>
  values.find((v) => v !== undefined && v !== "");

export function parseCliOptions(raw: unknown): CliOptions {
  const parsed = CliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(issue.message, { cause: parsed.error, field: issue.path.join(".") });
  }
  return parsed.data;
}

export function resolveConfig(path: string, opts: CliOptions, env: Env): RunConfig {
  const token = firstSet(opts.qiitaToken, env[ENV.token]);
  if (!token) {
    throw new MissingCredentialError(
      `--qiita-token or environment variable ${ENV.token} is not set.`,
    );
  }

  const parsed = RunConfigSchema.safeParse({
    path,
    token,
    baseUrl: (firstSet(opts.baseUrl, env[ENV.baseUrl]) ?? DEFAULT_BASE_URL).replace(/\/+$/, ""),
    diffCommand: firstSet(opts.diffCommand, env[ENV.diffCommand]) ?? DEFAULT_DIFF_COMMAND,
    dryRun: opts.dryRun,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid configuration: ${issue.message}`, {
      cause: parsed.error,
      field: issue.path.join("."),
    });
  }
  return parsed.data;
}

export function toQiitaCfg(cfg: RunConfig): QiitaCfg {
  return { baseUrl: cfg.baseUrl, token: cfg.token };
}
