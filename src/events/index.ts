// 事件总线：进程内单例 EventEmitter，供展示适配层 emit、HTTP 层 subscribe

import { EventEmitter } from "node:events";


/** 展示层可观察到的全部变化 */
export type ViewEvent =
  | { type: "label"; viewId: string; text: string }
  | { type: "clear"; viewId: string }
  | { type: "add"; viewId: string; title: string; url: string; thumbnail?: string; categoryId: string; sourceName: string }
  | { type: "error"; viewId: string; message: string }
  | { type: "reveal"; viewId: string }
  | { type: "badge"; viewId: string; categoryId: string };


/** 站点图标回写完成 */
export interface FaviconUpdatedEvent {
  sourceUrl: string;
  faviconUrl: string;
}


/** 全局单例事件总线，setMaxListeners 避免 SSE 多连接时的警告 */
export const eventBus = new EventEmitter();
eventBus.setMaxListeners(200);


export function emitViewEvent(e: ViewEvent): void {
  eventBus.emit("view", e);
}


/** 订阅视图事件，返回取消订阅函数 */
export function onViewEvent(fn: (e: ViewEvent) => void): () => void {
  eventBus.on("view", fn);
  return () => eventBus.off("view", fn);
}


export function emitFaviconUpdated(payload: FaviconUpdatedEvent): void {
  eventBus.emit("favicon:updated", payload);
}


export function onFaviconUpdated(fn: (e: FaviconUpdatedEvent) => void): () => void {
  eventBus.on("favicon:updated", fn);
  return () => eventBus.off("favicon:updated", fn);
}
