// Article entities shared by the parser, the gate and the publisher.

export interface ArticleHeader {
  readonly title?: string;
  /** The stored `0url` value, as written in the document. */
  readonly url?: string;
  /** Trailing path segment of `url`; absent until the article exists remotely. */
  readonly remoteId?: string;
  readonly tags: readonly string[];
}

export interface ParsedDocument {
  header: ArticleHeader;
  /** Everything after the end-marker line, verbatim. */
  body: string;
}

export interface ItemTag {
  name: string;
  versions: string[];
}

/** Request body for POST and PATCH /api/v2/items. */
export interface ItemPayload {
  body: string;
  tags: ItemTag[];
  title?: string;
}

export type Operation = "create" | "update";

export type PublishOutcome =
  | { status: "published"; url: string }
  | { status: "declined" };

export function toItemPayload(header: ArticleHeader, body: string): ItemPayload {
  return {
    body,
    tags: header.tags.map((name) => ({ name, versions: [] })),
    title: header.title,
  };
}
