// CLI command: qiita-publish <path-markdown>
// Binds env/flags, builds the logger, wires adapters, and invokes the core use case.
// No business logic here beyond option normalization and dependency wiring.

import { Command } from "commander";
import { ExternalDiffViewer } from "./adapters/diff-viewer";
import { QiitaItemRepository } from "./adapters/qiita-repos";
import { ReadlineTerminal } from "./adapters/terminal";
import { ConsoleLogger, logLevelFromFlags, type Logger } from "./logging/logger";
import { ExitCode, runPublish, type PublishDeps } from "./publish-article";
import {
  DEFAULT_BASE_URL,
  DEFAULT_DIFF_COMMAND,
  ENV,
  parseCliOptions,
  resolveConfig,
  toQiitaCfg,
  type Env,
  type RunConfig,
} from "./utils/config";

export type DepsFactory = (cfg: RunConfig, logger: Logger) => PublishDeps;

export interface CommandContext {
  env?: Env;
  createDeps?: DepsFactory;
  /** Receives the exit code once the action has finished. */
  onExit?: (code: ExitCode) => void;
}

function envOrDef(env: Env, name: string, def: string, secret = false): string {
  const v = env[name];
  if (!v) return `${def} (default)`;
  return `${secret ? "***" : v} (current)`;
}

function envHelp(env: Env): string {
  return `
Environment variables
  ${ENV.token.padEnd(20)} ${envOrDef(env, ENV.token, "(unset)", true)}
      Alternative to --qiita-token.
  ${ENV.baseUrl.padEnd(20)} ${envOrDef(env, ENV.baseUrl, DEFAULT_BASE_URL)}
      Alternative to --base-url.
  ${ENV.diffCommand.padEnd(20)} ${envOrDef(env, ENV.diffCommand, DEFAULT_DIFF_COMMAND)}
      Alternative to --diff-command.

Exit status
  0 published, 1 declined at the prompt, 2 error.
`;
}

/** Build concrete adapters from the resolved configuration. */
export function buildDefaultDeps(cfg: RunConfig, logger: Logger): PublishDeps {
  return {
    items: new QiitaItemRepository(toQiitaCfg(cfg)),
    terminal: new ReadlineTerminal(),
    diff: new ExternalDiffViewer(cfg.diffCommand, logger),
    logger,
  };
}

const increaseVerbosity = (_value: string, previous: number): number => previous + 1;

/** Construct the commander Command. */
export function makePublishCommand(ctx: CommandContext = {}): Command {
  const env = ctx.env ?? process.env;
  const createDeps = ctx.createDeps ?? buildDefaultDeps;
  const onExit = ctx.onExit ?? ((code: ExitCode) => {
    process.exitCode = code;
  });

  return new Command("qiita-publish")
    .description("Create or update a Qiita article from a local Markdown file.")
    .argument("<path-markdown>", "Markdown file starting with a <!-- ... --> header block")
    .option("--dry-run", "Dry run (not implemented).", false)
    .option("--qiita-token <token>", `Qiita API access token (or set ${ENV.token})`)
    .option("--base-url <url>", `API origin (or set ${ENV.baseUrl})`)
    .option("--diff-command <cmd>", `Diff tool run as <cmd> <remote> <local> (or set ${ENV.diffCommand})`)
    .option("-q, --quiet", "Quiet mode.", false)
    .option("-v, --verbose", "Print verbose output. -vv to show debug output.", increaseVerbosity, 0)
    .addHelpText("after", envHelp(env))
    .action(async (pathMarkdown: string, rawOpts: unknown) => {
      // errors before the flags are known are still reported at the default level
      let logger: Logger = new ConsoleLogger();
      try {
        const opts = parseCliOptions(rawOpts);
        logger = new ConsoleLogger(logLevelFromFlags(opts.quiet, opts.verbose));
        const cfg = resolveConfig(pathMarkdown, opts, env);
        onExit(await runPublish(cfg, createDeps(cfg, logger)));
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        logger.error(msg);
        onExit(ExitCode.Failure);
      }
    });
}
