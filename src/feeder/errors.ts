// 抓取失败分类：每种原因对应一条面向用户的标题文案


export type FeedFailureKind =
  | "empty-url"
  | "invalid-url"
  | "local-missing"
  | "local-unreadable"
  | "network"
  | "http"
  | "empty-response"
  | "parse"
  | "unexpected";


export const FEED_ERROR_LABELS = {
  emptyUrl: "Error loading feed — invalid (empty) URL",
  invalidUrl: "Error loading feed — invalid URL",
  localMissing: "Error loading feed — local file not found",
  localUnreadable: "Failed to read local RSS file",
  network: "Error loading feed — network/DNS error",
  emptyResponse: "Error loading feed — empty response",
  generic: "Error loading feed",
  noLocalFeeds: "Local News — No local feeds configured",
} as const;


export function httpErrorLabel(status: number): string {
  return `Error loading feed — HTTP ${status}`;
}


/** 视图级错误提示（安全定时器到期且无条目时） */
export const VIEW_ERROR_MESSAGES = {
  offline: "No network connection detected. Check your connection and try again.",
  generic: "No articles could be loaded. Try refreshing or check your source settings.",
} as const;


/** 抓取失败：label 直接作为视图标题展示 */
export class FeedFetchError extends Error {
  constructor(readonly kind: FeedFailureKind, readonly label: string, options?: { cause?: unknown }) {
    super(label, options);
    this.name = "FeedFetchError";
  }

  /** 传输层失败（网络/DNS），用于离线提示 */
  get isNetworkFailure(): boolean {
    return this.kind === "network";
  }

  /** 远端拉取类失败：高条目量分类据此清理本地 feed 列表 */
  get isRemoteFailure(): boolean {
    return this.kind === "network" || this.kind === "http" || this.kind === "empty-response" || this.kind === "unexpected";
  }
}
