// 图片候选类型

/** 候选来源标签，按提取手段区分 */
export type ImagePriority =
  | "srcset-selected"
  | "href-to-file"
  | "src-attribute"
  | "json-ld"
  | "og-tag"
  | "cdn-pattern";


/** 单次解析调用内的图片候选 */
export interface ImageCandidate {
  url: string;
  priority: ImagePriority;
}
