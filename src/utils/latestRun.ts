/**
 * 只认最近一次开始的运行，更早的运行结果到达时丢弃
 */
export class LatestRun {
  private current = 0;

  start(): number {
    return ++this.current;
  }

  isCurrent(run: number): boolean {
    return run === this.current;
  }

  /** 作废所有进行中的运行 */
  invalidate(): void {
    this.current++;
  }
}
