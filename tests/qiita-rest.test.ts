// Tests for the Qiita adapter using jest.fn() stubs in place of axios (no network).

import { AxiosError } from "axios";
import {
  authHeaders,
  getItem,
  itemPath,
  makeClient,
  patchItem,
  postItem,
} from "../lib/adapters/qiita-rest";
import { QiitaItemRepository } from "../lib/adapters/qiita-repos";
import type { ItemPayload } from "../lib/domain/article";
import { RemoteRequestFailedError } from "../lib/domain/errors";
import type { QiitaCfg } from "../lib/utils/config";

const cfg: QiitaCfg = { baseUrl: "https://qiita.example.test", token: "test-token" };

const payload: ItemPayload = {
  body: "# Hi\n",
  tags: [{ name: "typescript", versions: [] }],
  title: "Hi",
};

const JSON_HEADERS = { headers: { "Content-Type": "application/json" } };

function makeHttp() {
  const get = jest.fn();
  const post = jest.fn();
  const patch = jest.fn();
  return { http: { get, post, patch }, get, post, patch };
}

describe("client setup", () => {
  it("sends a bearer token", () => {
    expect(authHeaders(cfg)).toEqual({ Authorization: "Bearer test-token" });
  });

  it("points the client at the configured origin", () => {
    const client = makeClient(cfg);
    expect(client.defaults.baseURL).toBe("https://qiita.example.test");
    expect(client.defaults.headers.Authorization).toBe("Bearer test-token");
  });

  it("encodes item ids into the path", () => {
    expect(itemPath("abc123")).toBe("/api/v2/items/abc123");
    expect(itemPath("a/b")).toBe("/api/v2/items/a%2Fb");
  });
});

describe("postItem", () => {
  it("posts the payload and returns the new url", async () => {
    const { http, post } = makeHttp();
    post.mockResolvedValue({ status: 201, data: { id: "new123", url: "https://qiita.com/u/items/new123" } });

    await expect(postItem(http, payload)).resolves.toEqual({ url: "https://qiita.com/u/items/new123" });
    expect(post).toHaveBeenCalledWith("/api/v2/items", payload, JSON_HEADERS);
  });

  it("fails on a 2xx response without a url", async () => {
    const { http, post } = makeHttp();
    post.mockResolvedValue({ status: 201, data: {} });

    await expect(postItem(http, payload)).rejects.toThrow(
      "Failed to create item: unexpected response (missing url)",
    );
  });

  it("wraps transport errors", async () => {
    const { http, post } = makeHttp();
    post.mockRejectedValue(new AxiosError("connect ECONNREFUSED", "ECONNREFUSED"));

    const err = await postItem(http, payload).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RemoteRequestFailedError);
    expect(err).toMatchObject({ message: "Failed to create item: connect ECONNREFUSED", status: undefined });
  });

  it("wraps non-axios errors", async () => {
    const { http, post } = makeHttp();
    post.mockRejectedValue(new Error("socket hang up"));

    await expect(postItem(http, payload)).rejects.toThrow("Failed to create item: socket hang up");
  });
});

describe("getItem", () => {
  it("returns url and body", async () => {
    const { http, get } = makeHttp();
    get.mockResolvedValue({ status: 200, data: { url: "https://qiita.com/u/items/abc123", body: "old" } });

    await expect(getItem(http, "abc123")).resolves.toEqual({
      url: "https://qiita.com/u/items/abc123",
      body: "old",
    });
    expect(get).toHaveBeenCalledWith("/api/v2/items/abc123");
  });

  it("turns a 404 into RemoteRequestFailedError with the status", async () => {
    const { http, get } = makeHttp();
    get.mockResolvedValue({
      status: 404,
      statusText: "Not Found",
      data: { message: "Not found", type: "not_found" },
    });

    const err = await getItem(http, "abc123").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RemoteRequestFailedError);
    expect(err).toMatchObject({
      status: 404,
      message: "Failed to get item abc123: Not found (HTTP 404 Not Found)",
    });
  });

  it("falls back to a generic message for an empty error body", async () => {
    const { http, get } = makeHttp();
    get.mockResolvedValue({ status: 500, data: "" });

    await expect(getItem(http, "abc123")).rejects.toThrow(
      "Failed to get item abc123: request failed (HTTP 500)",
    );
  });
});

describe("patchItem", () => {
  it("patches the item path with the payload", async () => {
    const { http, patch } = makeHttp();
    patch.mockResolvedValue({ status: 200, data: { url: "https://qiita.com/u/items/abc123" } });

    await expect(patchItem(http, "abc123", payload)).resolves.toEqual({
      url: "https://qiita.com/u/items/abc123",
    });
    expect(patch).toHaveBeenCalledWith("/api/v2/items/abc123", payload, JSON_HEADERS);
  });

  it("fails on 401", async () => {
    const { http, patch } = makeHttp();
    patch.mockResolvedValue({
      status: 401,
      statusText: "Unauthorized",
      data: { message: "Unauthorized", type: "unauthorized" },
    });

    await expect(patchItem(http, "abc123", payload)).rejects.toMatchObject({ status: 401 });
  });
});

describe("QiitaItemRepository", () => {
  it("routes create, get and update to POST, GET and PATCH", async () => {
    const { http, get, post, patch } = makeHttp();
    post.mockResolvedValue({ status: 201, data: { url: "https://qiita.com/u/items/new123" } });
    get.mockResolvedValue({ status: 200, data: { url: "https://qiita.com/u/items/abc123", body: "old" } });
    patch.mockResolvedValue({ status: 200, data: { url: "https://qiita.com/u/items/abc123" } });
    const repo = new QiitaItemRepository(cfg, http);

    await repo.create(payload);
    await repo.get("abc123");
    await repo.update("abc123", payload);

    expect(post).toHaveBeenCalledTimes(1);
    expect(get).toHaveBeenCalledWith("/api/v2/items/abc123");
    expect(patch).toHaveBeenCalledWith("/api/v2/items/abc123", payload, JSON_HEADERS);
  });
});
