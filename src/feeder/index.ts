// Feeder：抓取编排、代次保护与 UI 调度，与展示层通过 PresentationView 解耦

export { FetchOrchestrator, LOCAL_FEED_CATEGORY_NAME, LOCAL_FEED_SOURCE_NAME } from "./orchestrator.js";
export type { OrchestratorDeps } from "./orchestrator.js";
export { fetchRssUrl } from "./fetchFeed.js";
export type { FetchFeedDeps, FetchFeedResult } from "./fetchFeed.js";
export { EpochGuard } from "./epoch.js";
export { UiDispatcher } from "./dispatcher.js";
export { GuardedSink, guardSink } from "./sink.js";
export type { BatchOptions, GuardedSinkOptions } from "./sink.js";
export { FeedFetchError, FEED_ERROR_LABELS, VIEW_ERROR_MESSAGES, httpErrorLabel } from "./errors.js";
export type { FeedFailureKind } from "./errors.js";
export type { FetchRequest, FetchResult, PresentationView, ViewState } from "./types.js";
