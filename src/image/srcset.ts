// srcset 解析：在 "url 描述符" 列表中选出宽度最大的一项

import { decodeAmp } from "../utils/url.js";


/**
 * 选出 srcset 中 `w` 描述符最大的 URL。
 * 没有任何可解析的宽度描述符（如只有 `2x` 或无描述符）时退回第一项；空串返回 undefined。
 */
export function selectLargestFromSrcset(srcset: string): string | undefined {
  let bestWidth = -1;
  let bestUrl: string | undefined;
  let firstUrl: string | undefined;
  for (const part of srcset.split(",")) {
    const entry = part.trim();
    if (!entry) continue;
    const [url, ...rest] = entry.split(/\s+/);
    if (!url) continue;
    firstUrl ??= url;
    const m = /^(\d+)w$/.exec(rest.join(" ").trim());
    if (!m) continue;
    const width = Number(m[1]);
    if (width > bestWidth) {
      bestWidth = width;
      bestUrl = url;
    }
  }
  const chosen = bestUrl ?? firstUrl;
  return chosen != null ? decodeAmp(chosen) : undefined;
}
