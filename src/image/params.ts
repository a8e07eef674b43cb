// 通用缩放参数剥离：WordPress/Jetpack 等图片优化插件常在 URL 上附带 ?resize=406x232、?w=300、?fit=crop


const RESIZE_PARAM_KEYS = new Set(["resize", "w", "h", "width", "height", "fit", "crop", "quality", "zoom"]);


/** 按键名（忽略大小写）去掉缩放/裁剪/质量参数，其余参数保持原顺序与原始写法 */
export function stripResizeParams(url: string): string {
  const hashIdx = url.indexOf("#");
  const fragment = hashIdx >= 0 ? url.slice(hashIdx) : "";
  const withoutFragment = hashIdx >= 0 ? url.slice(0, hashIdx) : url;
  const q = withoutFragment.indexOf("?");
  if (q < 0) return url;
  const base = withoutFragment.slice(0, q);
  const kept = withoutFragment
    .slice(q + 1)
    .split("&")
    .filter((param) => {
      if (param === "") return false;
      const key = param.split("=", 1)[0] ?? "";
      return !RESIZE_PARAM_KEYS.has(key.toLowerCase());
    });
  return (kept.length > 0 ? `${base}?${kept.join("&")}` : base) + fragment;
}
