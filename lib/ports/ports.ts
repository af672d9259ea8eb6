// Ports used by the publish use case. Adapters live in ../adapters.

import type { ItemPayload } from "../domain/article";

export interface RemoteItem {
  url: string;
  body: string;
}

export interface IItemRepository {
  create(payload: ItemPayload): Promise<{ url: string }>;
  get(itemId: string): Promise<RemoteItem>;
  update(itemId: string, payload: ItemPayload): Promise<{ url: string }>;
}

/** Operator-facing output and line input. */
export interface ITerminal {
  print(line: string): void;
  ask(question: string): Promise<string>;
}

export interface IDiffViewer {
  /** Shows remote vs local; never throws on a tool that fails to launch. */
  show(remote: string, local: string): Promise<void>;
}
