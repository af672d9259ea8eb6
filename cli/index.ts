#!/usr/bin/env node
// Program root: parses argv and turns the outcome into the process exit code.

import { CommanderError } from "commander";
import { makePublishCommand, type CommandContext } from "../lib/qiita-publish";
import { ExitCode } from "../lib/publish-article";

export async function main(
  argv: string[] = process.argv.slice(2),
  ctx: Omit<CommandContext, "onExit"> = {},
): Promise<ExitCode> {
  let code: ExitCode = ExitCode.Ok;
  const program = makePublishCommand({
    ...ctx,
    onExit: (c) => {
      code = c;
    },
  }).exitOverride();

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (err) {
    // commander already printed its usage message
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? ExitCode.Ok : ExitCode.Failure;
    }
    throw err;
  }
  return code;
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = ExitCode.Failure;
    },
  );
}
