// Qiita API v2 REST helpers (axios-based). No hard-coded origin:
// all URLs derive from QiitaCfg.baseUrl. Errors are formatted via explainAxios().
//
// The client is created with validateStatus disabled so that every response
// reaches ensureOk(), which turns non-2xx statuses into RemoteRequestFailedError.

import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { z } from "zod";
import type { ItemPayload } from "../domain/article";
import { RemoteRequestFailedError } from "../domain/errors";
import type { QiitaCfg } from "../utils/config";

export const ITEMS_PATH = "/api/v2/items";

/** The subset of axios the helpers call; tests pass jest.fn() stubs. */
export type QiitaHttp = Pick<AxiosInstance, "get" | "post" | "patch">;

const ItemUrlSchema = z.object({ url: z.string() });
const ItemSchema = z.object({ url: z.string(), body: z.string() });
const ErrorBodySchema = z.object({ message: z.string() });

export function authHeaders(cfg: QiitaCfg): Record<string, string> {
  return { Authorization: `Bearer ${cfg.token}` };
}

export function itemPath(itemId: string): string {
  return `${ITEMS_PATH}/${encodeURIComponent(itemId)}`;
}

function describeStatus(status: number, statusText?: string): string {
  return ` (HTTP ${status}${statusText ? " " + statusText : ""})`;
}

function messageFromBody(data: unknown): string | undefined {
  const parsed = ErrorBodySchema.safeParse(data);
  return parsed.success ? parsed.data.message : undefined;
}

/** Transport-level failures (DNS, refused connection, timeouts). */
export function explainAxios(err: unknown, context: string): RemoteRequestFailedError {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const msg = messageFromBody(err.response?.data) ?? (err.message || "Axios error");
    const more = status ? describeStatus(status, err.response?.statusText) : "";
    return new RemoteRequestFailedError(`${context}: ${msg}${more}`, { cause: err, status });
  }
  const msg = err instanceof Error ? err.message : String(err);
  return new RemoteRequestFailedError(`${context}: ${msg}`, { cause: err });
}

export function ensureOk(res: AxiosResponse<unknown>, context: string): unknown {
  if (res.status >= 200 && res.status < 300) return res.data;
  const msg = messageFromBody(res.data) ?? "request failed";
  throw new RemoteRequestFailedError(
    `${context}: ${msg}${describeStatus(res.status, res.statusText)}`,
    { status: res.status },
  );
}

function parseBody<T>(schema: z.ZodType<T>, data: unknown, context: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join(".") || "(root)").join(", ");
    throw new RemoteRequestFailedError(`${context}: unexpected response (missing ${fields})`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/** Create a preconfigured axios client for the API origin. */
export function makeClient(cfg: QiitaCfg): AxiosInstance {
  return axios.create({
    baseURL: cfg.baseUrl,
    headers: {
      ...authHeaders(cfg),
      Accept: "application/json",
    },
    validateStatus: () => true,
  });
}

/** POST /api/v2/items */
export async function postItem(http: QiitaHttp, payload: ItemPayload): Promise<{ url: string }> {
  const context = "Failed to create item";
  let res: AxiosResponse<unknown>;
  try {
    res = await http.post<unknown>(ITEMS_PATH, payload, {
      headers: { "Content-Type": "application/json" },
    });
  } catch (err) {
    throw explainAxios(err, context);
  }
  return parseBody(ItemUrlSchema, ensureOk(res, context), context);
}

/** GET /api/v2/items/:id */
export async function getItem(http: QiitaHttp, itemId: string): Promise<{ url: string; body: string }> {
  const context = `Failed to get item ${itemId}`;
  let res: AxiosResponse<unknown>;
  try {
    res = await http.get<unknown>(itemPath(itemId));
  } catch (err) {
    throw explainAxios(err, context);
  }
  return parseBody(ItemSchema, ensureOk(res, context), context);
}

/** PATCH /api/v2/items/:id */
export async function patchItem(
  http: QiitaHttp,
  itemId: string,
  payload: ItemPayload,
): Promise<{ url: string }> {
  const context = `Failed to update item ${itemId}`;
  let res: AxiosResponse<unknown>;
  try {
    res = await http.patch<unknown>(itemPath(itemId), payload, {
      headers: { "Content-Type": "application/json" },
    });
  } catch (err) {
    throw explainAxios(err, context);
  }
  return parseBody(ItemUrlSchema, ensureOk(res, context), context);
}
