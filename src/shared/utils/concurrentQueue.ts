/**
 * 简易并发队列，保证同一时刻不超过指定并发数运行任务。
 * @param concurrency 最大并发数，小于 1 或非有限数时按 1 处理
 */
export function createConcurrentQueue(concurrency: number) {
  const limit = Number.isFinite(concurrency) ? Math.max(Math.floor(concurrency), 1) : 1;
  let activeCount = 0;
  const queue: Array<() => void> = [];

  const processQueue = () => {
    if (activeCount >= limit) {
      return;
    }

    const next = queue.shift();
    if (!next) {
      return;
    }

    next();
  };

  const enqueue = <T>(task: () => Promise<T>): Promise<T> => {
    return new Promise<T>((resolve, reject) => {
      const run = () => {
        activeCount += 1;
        void task()
          .then(resolve, reject)
          .finally(() => {
            // 释放名额并唤醒下一个等待的任务
            activeCount = Math.max(activeCount - 1, 0);
            processQueue();
          });
      };

      if (activeCount < limit) {
        run();
      } else {
        queue.push(run);
      }
    });
  };

  return {
    enqueue,
    get activeCount() {
      return activeCount;
    },
    get pendingCount() {
      return queue.length;
    }
  } as const;
}

export type ConcurrentQueue = ReturnType<typeof createConcurrentQueue>;
