// Parses the metadata block at the top of an article file:
//
//   <!--
//   0file: notes.md
//   0title: Hello
//   0url: https://qiita.com/someone/items/abc123
//   tags: typescript node
//   -->
//   body...

import type { ArticleHeader, ParsedDocument } from "./article";
import { MalformedHeaderError, UnterminatedHeaderError } from "./errors";
import type { Logger } from "../logging/logger";

export const START_MARKER = "<!--";
export const END_MARKER = "-->";

/** Marker that keeps `0url` unset until the article is first published. */
export const URL_PLACEHOLDER = "TODO";

interface MutableHeader {
  title?: string;
  url?: string;
  remoteId?: string;
  tags: string[];
}

const stripCr = (line: string): string => (line.endsWith("\r") ? line.slice(0, -1) : line);

/** Item id = trailing path segment of the article URL. */
export function remoteIdFromUrl(url: string): string {
  const trimmed = url.replace(/\/+$/, "");
  return trimmed.slice(trimmed.lastIndexOf("/") + 1);
}

function applyEntry(
  lineNo: number,
  key: string,
  value: string,
  header: MutableHeader,
  logger: Logger,
): void {
  switch (key) {
    case "0file":
      return;
    case "0title":
      header.title = value;
      return;
    case "0url": {
      if (value.includes(URL_PLACEHOLDER)) {
        logger.debug(`line ${lineNo}: skip ${URL_PLACEHOLDER} url`);
        return;
      }
      const id = remoteIdFromUrl(value);
      if (!id) {
        throw new MalformedHeaderError(lineNo, `cannot derive an item id from 0url: ${value}`);
      }
      header.url = value;
      header.remoteId = id;
      return;
    }
    case "tags":
      header.tags = value.split(" ").map((t) => t.trim()).filter((t) => t.length > 0);
      return;
    default:
      logger.warn(`line ${lineNo}: skip: ${key}: ${value}`);
  }
}

export function parseDocument(text: string, logger: Logger): ParsedDocument {
  const lines = text.split("\n");
  const first = stripCr(lines[0]);
  if (first !== START_MARKER) {
    throw new MalformedHeaderError(1, `expected ${START_MARKER}; was: ${first}`);
  }

  const header: MutableHeader = { tags: [] };
  for (let i = 1; i < lines.length; i++) {
    const lineNo = i + 1;
    const line = stripCr(lines[i]);
    logger.debug(`${lineNo}: ${line}`);

    if (line === END_MARKER) {
      return { header, body: lines.slice(i + 1).join("\n") };
    }

    const colon = line.indexOf(":");
    if (colon < 0) {
      throw new MalformedHeaderError(lineNo, `expected "key: value"; was: ${line}`);
    }
    const key = line.slice(0, colon).trim();
    const value = line.slice(colon + 1).trim();
    applyEntry(lineNo, key, value, header, logger);
  }

  throw new UnterminatedHeaderError(`${END_MARKER} not found (read ${lines.length} lines)`);
}

export function parseHeader(text: string, logger: Logger): ArticleHeader {
  return parseDocument(text, logger).header;
}
