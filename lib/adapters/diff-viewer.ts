// Shows remote vs local article bodies with an external line-diff tool
// (icdiff by default). The two bodies are written to scratch files in a
// private temp directory, which is removed once the tool has exited.
// A test hook lets us inject a fake command runner.

import { spawnSync } from "child_process";
import { mkdtemp } from "fs/promises";
import os from "os";
import path from "path";
import fs from "fs-extra";
import type { IDiffViewer } from "../ports/ports";
import type { Logger } from "../logging/logger";

/** Command runner result */
export interface RunResult {
  code: number | null;
  /** Set when the process could not be started (e.g. ENOENT). */
  error?: Error;
}

/** Command runner signature */
export type CommandRunner = (cmd: string[]) => RunResult;

/** Default runner: inherits the terminal so the diff renders in place. */
const defaultRunner: CommandRunner = (cmd) => {
  const proc = spawnSync(cmd[0], cmd.slice(1), { stdio: "inherit" });
  return { code: proc.status, error: proc.error };
};

export const REMOTE_FILE = "remote.md";
export const LOCAL_FILE = "local.md";

export class ExternalDiffViewer implements IDiffViewer {
  private readonly command: string[];

  constructor(
    command: string,
    private readonly logger: Logger,
    private readonly runner: CommandRunner = defaultRunner,
  ) {
    this.command = command.trim().split(/\s+/);
  }

  async show(remote: string, local: string): Promise<void> {
    const dir = await mkdtemp(path.join(os.tmpdir(), "qiita-publish-"));
    try {
      const remotePath = path.join(dir, REMOTE_FILE);
      const localPath = path.join(dir, LOCAL_FILE);
      await fs.outputFile(remotePath, remote, "utf8");
      await fs.outputFile(localPath, local, "utf8");

      const cmd = [...this.command, remotePath, localPath];
      this.logger.info(cmd.join(" "));
      const { code, error } = this.runner(cmd);
      if (error) {
        this.logger.warn(`could not launch ${this.command[0]}: ${error.message}`);
      } else if (code !== 0) {
        this.logger.debug(`${this.command[0]} exited with ${code}`);
      }
    } finally {
      await fs.remove(dir);
    }
  }
}
