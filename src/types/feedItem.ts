/**
 * 流水线内部统一的条目定义与结果回调契约
 * Parser / Enricher → ResultSink → 展示层
 */

export interface FeedItem {
  /** 标题 */
  readonly title: string;
  /** 原文链接 */
  readonly link: string;
  /** 缩略图（无则为 undefined） */
  readonly thumbnail?: string;
}


/** 更新标题栏文案 */
export type SetLabelFn = (text: string) => void;


/** 清空当前列表 */
export type ClearItemsFn = () => void;


/** 追加（或按 url 更新）一条条目 */
export type AddItemFn = (
  title: string,
  url: string,
  thumbnail: string | undefined,
  categoryId: string,
  sourceName: string,
) => void;


/** 结果回调三元组：所有抓取入口都以它为参数，展示层只会观察到这三类变化 */
export interface ResultSink {
  setLabel: SetLabelFn;
  clearItems: ClearItemsFn;
  addItem: AddItemFn;
}
