// Qiita adapter implementing IItemRepository using axios and the REST helpers.

import type { ItemPayload } from "../domain/article";
import type { IItemRepository, RemoteItem } from "../ports/ports";
import type { QiitaCfg } from "../utils/config";
import { getItem, makeClient, patchItem, postItem, type QiitaHttp } from "./qiita-rest";

export class QiitaItemRepository implements IItemRepository {
  private readonly http: QiitaHttp;

  constructor(cfg: QiitaCfg, http?: QiitaHttp) {
    this.http = http ?? makeClient(cfg);
  }

  create(payload: ItemPayload): Promise<{ url: string }> {
    return postItem(this.http, payload);
  }

  get(itemId: string): Promise<RemoteItem> {
    return getItem(this.http, itemId);
  }

  update(itemId: string, payload: ItemPayload): Promise<{ url: string }> {
    return patchItem(this.http, itemId, payload);
  }
}
