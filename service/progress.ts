/**
 * 单次请求的进度上下文，由流水线显式传递
 */
import type { ProgressState } from './types';

export type ProgressListener = (state: ProgressState) => void;

export class ProgressTracker {
  private state: ProgressState = { percent: 0, status: '' };

  constructor(private readonly listener?: ProgressListener) {}

  get current(): ProgressState {
    return { ...this.state };
  }

  /** percent 只增不减；传入更小的值时保持原值，只更新状态文案 */
  report(percent: number, status: string): void {
    const clamped = Math.max(0, Math.min(100, Math.round(percent)));
    this.state = { percent: Math.max(this.state.percent, clamped), status };
    this.listener?.(this.current);
  }

  /** 失败时只更新文案 */
  fail(status: string): void {
    this.report(this.state.percent, status);
  }
}
