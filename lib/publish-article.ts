// Core use case: publish one article file to Qiita.
// - Reads the file completely before any request
// - Parses the header block; the body is what follows it
// - No remote id: confirm, then POST
// - Remote id: GET, show the diff, confirm, then PATCH
//
// Side-effects happen only through the injected ports.

import fs from "fs-extra";
import { toItemPayload, type ArticleHeader, type PublishOutcome } from "./domain/article";
import { parseDocument } from "./domain/header-parser";
import { confirm } from "./confirm";
import type { Logger } from "./logging/logger";
import type { IDiffViewer, IItemRepository, ITerminal } from "./ports/ports";
import type { RunConfig } from "./utils/config";

export interface PublishDeps {
  items: IItemRepository;
  terminal: ITerminal;
  diff: IDiffViewer;
  logger: Logger;
}

export const ExitCode = {
  Ok: 0,
  Declined: 1,
  Failure: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Printed after a successful request, in the form the header block expects. */
function reportUrl(terminal: ITerminal, url: string): void {
  terminal.print(`0url: ${url}`);
}

/** https://qiita.com/api/v2/docs#post-apiv2items */
export async function createArticle(
  header: ArticleHeader,
  body: string,
  deps: PublishDeps,
): Promise<PublishOutcome> {
  const payload = toItemPayload(header, body);
  if (!(await confirm(header, body, "create", deps))) {
    return { status: "declined" };
  }
  const { url } = await deps.items.create(payload);
  deps.logger.info(`created ${url}`);
  reportUrl(deps.terminal, url);
  return { status: "published", url };
}

/** https://qiita.com/api/v2/docs#patch-apiv2itemsitem_id */
export async function updateArticle(
  header: ArticleHeader & { remoteId: string },
  body: string,
  deps: PublishDeps,
): Promise<PublishOutcome> {
  const payload = toItemPayload(header, body);

  const remote = await deps.items.get(header.remoteId);
  deps.logger.debug(`fetched ${header.remoteId} (${remote.body.length} chars)`);
  await deps.diff.show(remote.body, body);

  if (!(await confirm(header, body, "update", deps))) {
    return { status: "declined" };
  }
  const { url } = await deps.items.update(header.remoteId, payload);
  deps.logger.info(`updated ${url}`);
  reportUrl(deps.terminal, url);
  return { status: "published", url };
}

/** The only branch in the flow: unset remote id creates, a set one updates. */
export function publishArticle(
  header: ArticleHeader,
  body: string,
  deps: PublishDeps,
): Promise<PublishOutcome> {
  const { remoteId } = header;
  if (remoteId === undefined) {
    return createArticle(header, body, deps);
  }
  return updateArticle({ ...header, remoteId }, body, deps);
}

export async function runPublish(cfg: RunConfig, deps: PublishDeps): Promise<ExitCode> {
  if (cfg.dryRun) {
    deps.logger.warn("--dry-run is not implemented; continuing normally");
  }
  const text = await fs.readFile(cfg.path, "utf8");
  const { header, body } = parseDocument(text, deps.logger);
  const outcome = await publishArticle(header, body, deps);
  return outcome.status === "published" ? ExitCode.Ok : ExitCode.Declined;
}
