// 事件总线视图：把 PresentationView 回调转成 ViewEvent，由 SSE 推给前端

import { emitViewEvent } from "../events/index.js";
import type { PresentationView } from "../feeder/types.js";
import type { AddItemFn, ClearItemsFn, SetLabelFn } from "../types/feedItem.js";


export class EventBusView implements PresentationView {
  constructor(readonly id: string) {}

  readonly setLabel: SetLabelFn = (text) => {
    emitViewEvent({ type: "label", viewId: this.id, text });
  };

  readonly clearItems: ClearItemsFn = () => {
    emitViewEvent({ type: "clear", viewId: this.id });
  };

  readonly addItem: AddItemFn = (title, url, thumbnail, categoryId, sourceName) => {
    emitViewEvent({ type: "add", viewId: this.id, title, url, thumbnail, categoryId, sourceName });
  };

  showError(message: string): void {
    emitViewEvent({ type: "error", viewId: this.id, message });
  }

  reveal(): void {
    emitViewEvent({ type: "reveal", viewId: this.id });
  }

  refreshBadge(categoryId: string): void {
    emitViewEvent({ type: "badge", viewId: this.id, categoryId });
  }
}
