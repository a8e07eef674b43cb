// 运行时开关：调试输出与 CDN 专用提取，均只读环境变量，随时可改


/** 调试开关：FEEDLINE_DEBUG 只要存在即开启 */
export function isDebugEnabled(): boolean {
  return process.env.FEEDLINE_DEBUG != null;
}


/** CDN 专用提取/规整开关：仅显式 "0" 关闭，缺省或其他值均开启 */
export function isCdnExtractEnabled(): boolean {
  const v = process.env.FEEDLINE_ENABLE_CDN_EXTRACT;
  if (v == null) return true;
  return v !== "0";
}
