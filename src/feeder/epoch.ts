// 抓取代次：单调递增，同一时刻只有一个当前代；旧代的在途任务不取消，只在投递时丢弃


export class EpochGuard {
  private current = 0;
  private view: string | undefined;

  /** 分配下一代并绑定到发起它的视图 */
  beginNewEpoch(viewId: string): number {
    this.current++;
    this.view = viewId;
    return this.current;
  }

  /** 只读比较，不修改状态 */
  isCurrent(epoch: number): boolean {
    return epoch === this.current;
  }

  get currentEpoch(): number {
    return this.current;
  }

  /** 当前代所属视图；尚未开始任何抓取时为 undefined */
  get currentView(): string | undefined {
    return this.view;
  }
}
