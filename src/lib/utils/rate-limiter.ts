/**
 * リクエスト間隔制御
 *
 * @description 直前のリクエスト完了から最小間隔を空けて、1件ずつ順番に実行する。
 * BOJ API は高頻度アクセスで接続を遮断することがあるため、クライアントごとに直列化する
 */

import { sleep } from './retry';

export interface RateLimiterOptions {
  /** 最小リクエスト間隔（ミリ秒、デフォルト: 1000） */
  minIntervalMs?: number;
}

/**
 * 直列キュー方式のレート制限
 *
 * 状態（最終完了時刻とキュー末尾）はインスタンスが所有し、プロセス全体では共有しない
 */
export class RateLimiter {
  private readonly minIntervalMs: number;
  private lastCompletedAt: number | null = null;
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(options?: RateLimiterOptions) {
    this.minIntervalMs = options?.minIntervalMs ?? 1000;
  }

  /**
   * 次のタスクを開始できるまでの待機時間（ミリ秒）
   */
  private getWaitTime(minIntervalMs: number): number {
    if (this.lastCompletedAt === null) {
      return 0;
    }
    const elapsed = Date.now() - this.lastCompletedAt;
    return Math.max(0, minIntervalMs - elapsed);
  }

  /**
   * タスクをキューに積み、前のタスク完了から最小間隔を空けて実行する
   *
   * @param task 実行する非同期処理（1回の HTTP リクエスト）
   * @param minIntervalMs この呼び出しだけ間隔を上書きする場合に指定
   */
  schedule<T>(task: () => Promise<T>, minIntervalMs: number = this.minIntervalMs): Promise<T> {
    this.pending++;

    const run = async (): Promise<T> => {
      const waitTime = this.getWaitTime(minIntervalMs);
      if (waitTime > 0) {
        await sleep(waitTime);
      }
      try {
        return await task();
      } finally {
        this.lastCompletedAt = Date.now();
        this.pending--;
      }
    };

    const result = this.tail.then(run);
    // 失敗したタスクは呼び出し元に result 経由で伝わる。キューは次のタスクへ進める
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /**
   * 実行待ち・実行中のタスク数
   */
  get queueLength(): number {
    return this.pending;
  }
}
