// 后台补图：并发闸门 + Open Graph / CDN 高清图两种抓取
export { EnrichThrottle } from "./throttle.js";
export type { ThrottleOptions } from "./throttle.js";
export { createOpenGraphFetcher, resolveOpenGraph } from "./openGraph.js";
export { createCdnHighResFetcher, resolveCdnHighRes } from "./cdnHighRes.js";
export { createEnricher } from "./run.js";
export type { EnrichDeps, EnrichFn, EnrichResult, ResolveFn } from "./types.js";
