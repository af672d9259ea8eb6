// Test doubles for the publish ports.

import type { ItemPayload } from "../lib/domain/article";
import { RemoteRequestFailedError } from "../lib/domain/errors";
import { ConsoleLogger, type LogLevel, type LogSink } from "../lib/logging/logger";
import type { IDiffViewer, IItemRepository, ITerminal, RemoteItem } from "../lib/ports/ports";

export function makeRecordingLogger(level: LogLevel = "debug") {
  const lines: string[] = [];
  const record = (...args: unknown[]) => {
    lines.push(args.map(String).join(" "));
  };
  const sink: LogSink = { error: record, warn: record, info: record, debug: record };
  return { logger: new ConsoleLogger(level, sink), lines };
}

export class FakeTerminal implements ITerminal {
  readonly printed: string[] = [];
  readonly questions: string[] = [];

  constructor(private readonly answers: string[] = []) {}

  print(line: string): void {
    this.printed.push(line);
  }

  ask(question: string): Promise<string> {
    this.questions.push(question);
    return Promise.resolve(this.answers.shift() ?? "");
  }
}

type Method = "GET" | "POST" | "PATCH";

export class FakeItemRepository implements IItemRepository {
  readonly calls: string[] = [];
  readonly payloads: ItemPayload[] = [];

  constructor(
    private readonly remote: RemoteItem = {
      url: "https://qiita.com/test-user/items/abc123",
      body: "old body\n",
    },
    private readonly failOn?: Method,
  ) {}

  private fail(method: Method): Promise<never> | undefined {
    if (this.failOn !== method) return undefined;
    return Promise.reject(new RemoteRequestFailedError(`${method} failed (HTTP 500)`, { status: 500 }));
  }

  create(payload: ItemPayload): Promise<{ url: string }> {
    this.calls.push("POST");
    this.payloads.push(payload);
    return this.fail("POST") ?? Promise.resolve({ url: "https://qiita.com/test-user/items/new123" });
  }

  get(itemId: string): Promise<RemoteItem> {
    this.calls.push(`GET ${itemId}`);
    return this.fail("GET") ?? Promise.resolve(this.remote);
  }

  update(itemId: string, payload: ItemPayload): Promise<{ url: string }> {
    this.calls.push(`PATCH ${itemId}`);
    this.payloads.push(payload);
    return this.fail("PATCH") ?? Promise.resolve({ url: this.remote.url });
  }
}

export class FakeDiffViewer implements IDiffViewer {
  readonly shown: { remote: string; local: string }[] = [];

  show(remote: string, local: string): Promise<void> {
    this.shown.push({ remote, local });
    return Promise.resolve();
  }
}
