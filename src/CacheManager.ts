import { AsyncMutex } from './AsyncMutex.js';
import { CacheErrorCode, ErrorHandler } from './errorHandler.js';
import { IndexStore } from './IndexStore.js';
import { LoggerDiagnostics } from './logger.js';
import { digestKey } from './PathResolver.js';
import { Pruner } from './Pruner.js';
import { ShardedFileStore } from './ShardedFileStore.js';
import type { CacheStats, ConsolidatedIndex, DiagnosticsSink, Digest, PruneReport } from './types.js';

export interface CacheManagerOptions {
  /** 缓存根目录，索引文件和分片目录都在它下面 */
  root: string;
  diagnostics?: DiagnosticsSink;
  now?: () => Date;
}

/**
 * 两级磁盘缓存的对外入口
 *
 * 查找先查合并索引，再回退到分片文件；写入只落到分片文件，合并交给 prune。
 * 注意 find 虽然是读操作，命中时会整体重写索引文件以刷新 last_used。
 *
 * 同一个实例上的操作经由互斥锁逐个执行；跨进程没有任何协调，
 * 两个进程同时重写索引时后写者会覆盖先写者的修改。
 */
export class CacheManager {
  private readonly indexStore: IndexStore;
  private readonly shardStore: ShardedFileStore;
  private readonly diagnostics: DiagnosticsSink;
  private readonly now: () => Date;
  private readonly mutex = new AsyncMutex();
  private stats = {
    indexHits: 0,
    shardHits: 0,
    misses: 0,
    saves: 0
  };

  constructor(private readonly options: CacheManagerOptions) {
    this.diagnostics = options.diagnostics ?? new LoggerDiagnostics();
    this.now = options.now ?? (() => new Date());
    this.indexStore = IndexStore.forRoot(options.root, this.diagnostics);
    this.shardStore = new ShardedFileStore(options.root);
  }

  get root(): string {
    return this.options.root;
  }

  /**
   * 查找条目，未命中返回 undefined。
   * 索引命中会刷新时间戳并重写索引；分片命中会把条目迁入索引并删除松散文件。
   * 索引读取或解析失败时两种写入都跳过。
   * 索引写入失败只产生警告，内容照常返回；分片读取的 I/O 错误会抛出
   */
  async find(digest: Digest): Promise<Buffer | undefined> {
    const key = digestKey(digest);

    return this.mutex.runExclusive(async () => {
      const { index, intact } = await this.indexStore.read();
      const entry = index.get(key);
      if (entry) {
        entry.lastUsed = this.now();
        if (intact) {
          await this.persistIndex(index, key);
        }
        this.stats.indexHits++;
        return entry.content;
      }

      const content = await this.shardStore.read(digest);
      if (content === null) {
        this.stats.misses++;
        return undefined;
      }

      // prune 尚未迁移这个条目，分片文件即为权威内容。
      // 索引没有完整读入时不重写它，松散文件留给 prune
      if (intact) {
        index.set(key, { content, lastUsed: this.now() });
        if (await this.persistIndex(index, key)) {
          await this.discardLooseFile(digest, key);
        }
      }
      this.stats.shardHits++;
      return content;
    });
  }

  /**
   * 写入分片文件；失败时抛出，调用方需要知道产物没有保存下来
   */
  async save(digest: Digest, content: Uint8Array): Promise<void> {
    digestKey(digest);

    await this.mutex.runExclusive(async () => {
      await this.shardStore.write(digest, content);
      this.stats.saves++;
    });
  }

  async prune(retentionWeeks: number): Promise<PruneReport> {
    return this.mutex.runExclusive(() =>
      new Pruner(this.options.root, { diagnostics: this.diagnostics, now: this.now }).prune(retentionWeeks)
    );
  }

  getStats(): CacheStats {
    const hits = this.stats.indexHits + this.stats.shardHits;
    const lookups = hits + this.stats.misses;
    return {
      ...this.stats,
      hitRate: lookups > 0 ? Math.round((hits / lookups) * 10000) / 100 : 0
    };
  }

  private async persistIndex(index: ConsolidatedIndex, key: string): Promise<boolean> {
    try {
      await this.indexStore.save(index);
      return true;
    } catch (error) {
      this.diagnostics.warning({
        code: CacheErrorCode.INDEX_WRITE_FAILED,
        message: `Could not refresh cache index for ${key}: ${ErrorHandler.formatError(error)}`,
        path: this.indexStore.path,
        cause: error
      });
      return false;
    }
  }

  private async discardLooseFile(digest: Digest, key: string): Promise<void> {
    try {
      await this.shardStore.remove(digest);
    } catch (error) {
      this.diagnostics.warning({
        code: CacheErrorCode.MIGRATION_FAILED,
        message: `Could not delete migrated cache entry ${key}: ${ErrorHandler.formatError(error)}`,
        cause: error
      });
    }
  }
}
