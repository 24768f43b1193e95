/**
 * 异步互斥锁
 * 让同一个 CacheManager 上的操作逐个执行，避免异步 I/O 交错
 */

type Waiter = () => void;

export class AsyncMutex {
  private locked = false;
  private waitingQueue: Waiter[] = [];

  /**
   * 获取锁
   */
  async lock(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this.waitingQueue.push(resolve);
    });
  }

  /**
   * 释放锁，直接把锁交给队首的等待者
   */
  unlock(): void {
    if (!this.locked) {
      throw new Error('Attempted to unlock a mutex that is not locked');
    }

    const next = this.waitingQueue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  /**
   * 执行需要锁保护的操作
   */
  async runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    await this.lock();
    try {
      return await operation();
    } finally {
      this.unlock();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  getQueueLength(): number {
    return this.waitingQueue.length;
  }
}
