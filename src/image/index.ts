// Image Resolver：片段取图、srcset 选择、CDN 规整、缩放参数剥离

export { extractFromHtmlSnippet, resolveImageCandidate } from "./snippet.js";
export { selectLargestFromSrcset } from "./srcset.js";
export { normalizeKnownCdn, isKnownCdnUrl, CDN_IMAGE_HOST_PATTERN } from "./cdn.js";
export { stripResizeParams } from "./params.js";
export type { ImageCandidate, ImagePriority } from "./types.js";
