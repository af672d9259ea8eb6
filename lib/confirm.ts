// Confirmation gate: every mutating request goes through confirm() first.

import type { ArticleHeader, Operation } from "./domain/article";
import type { Logger } from "./logging/logger";
import type { ITerminal } from "./ports/ports";

export const PREVIEW_CHARS = 50;

const ACCEPT = new Set(["y", "yes"]);

export interface ConfirmDeps {
  terminal: ITerminal;
  logger: Logger;
}

const oneLine = (s: string): string => s.replace(/\r?\n/g, " ");

export function isAffirmative(answer: string): boolean {
  return ACCEPT.has(answer.trim().toLowerCase());
}

export function summarize(header: ArticleHeader, body: string): string[] {
  return [
    `title:   ${header.title ?? "(none)"}`,
    `id:      ${header.remoteId ?? "(new)"}`,
    `tags:    ${header.tags.join(", ")}`,
    `content: ${oneLine(body.slice(0, PREVIEW_CHARS))}`,
    `         ... ${oneLine(body.slice(-PREVIEW_CHARS))}`,
  ];
}

export async function confirm(
  header: ArticleHeader,
  body: string,
  operation: Operation,
  { terminal, logger }: ConfirmDeps,
): Promise<boolean> {
  for (const line of summarize(header, body)) terminal.print(line);
  const answer = await terminal.ask(`${operation}? [y/N] `);
  if (!isAffirmative(answer)) {
    logger.warn(`aborted ${operation}`);
    return false;
  }
  return true;
}
