/**
 * 缓存维护：把分片文件迁移进合并索引，清理分片目录，淘汰超出保留期的条目
 */

import * as fs from 'fs-extra';
import type { Dirent } from 'fs';
import * as path from 'path';
import { CacheError, CacheErrorCode, ErrorHandler } from './errorHandler.js';
import { ENTRIES_FILE, IndexStore } from './IndexStore.js';
import { digestKeyFromEntryPath } from './PathResolver.js';
import type { ConsolidatedIndex, DiagnosticsSink, PruneReport } from './types.js';

export const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

const SHARD_DIR_PATTERN = /^[0-9a-f]{2}$/;

export interface PrunerOptions {
  diagnostics: DiagnosticsSink;
  now?: () => Date;
}

export class Pruner {
  private readonly diagnostics: DiagnosticsSink;
  private readonly now: () => Date;
  private readonly indexStore: IndexStore;

  constructor(private readonly root: string, options: PrunerOptions) {
    this.diagnostics = options.diagnostics;
    this.now = options.now ?? (() => new Date());
    this.indexStore = IndexStore.forRoot(root, this.diagnostics);
  }

  /**
   * 执行一次完整的维护。
   * 单个文件的读取或删除失败只记录警告；目录清理和索引写入失败会中止本次维护
   */
  async prune(retentionWeeks: number): Promise<PruneReport> {
    if (!Number.isInteger(retentionWeeks) || retentionWeeks < 0) {
      throw new CacheError(
        CacheErrorCode.INVALID_INPUT,
        `Retention window must be a non-negative whole number of weeks, got ${retentionWeeks}`,
        { retentionWeeks }
      );
    }

    try {
      await fs.ensureDir(this.root);
    } catch (error) {
      throw ErrorHandler.fromFileSystemError(error, 'Creating cache root', this.root);
    }

    const index = await this.indexStore.load();
    const migrated = await this.migrate(this.root, index);
    await this.removeShardDirectories();

    const pruned = this.evict(index, retentionWeeks * WEEK_MS);
    const removed = index.size - pruned.size;

    this.diagnostics.info(`Found ${index.size} cache entries in ${this.root}`);
    this.diagnostics.info(removed === 0 ? 'No outdated entries' : `Removed ${removed} outdated cache entries`);

    await this.indexStore.save(pruned);

    return {
      root: this.root,
      scanned: index.size,
      migrated,
      removed,
      kept: pruned.size
    };
  }

  /**
   * 遍历目录，把每个分片文件写入索引（覆盖已有条目），成功后删除文件
   */
  private async migrate(dir: string, index: ConsolidatedIndex): Promise<number> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      throw ErrorHandler.fromFileSystemError(error, 'Listing cache directory', dir);
    }

    let migrated = 0;
    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        migrated += await this.migrate(entryPath, index);
        continue;
      }
      if (dir === this.root && isIndexFile(entry.name)) {
        continue;
      }

      const key = entry.isFile() ? digestKeyFromEntryPath(this.root, entryPath) : null;
      if (key === null) {
        this.diagnostics.warning({
          code: CacheErrorCode.UNEXPECTED_FILE,
          message: 'Skipping file outside the shard layout',
          path: entryPath
        });
        continue;
      }

      if (await this.migrateFile(entryPath, key, index)) {
        migrated++;
      }
    }
    return migrated;
  }

  private async migrateFile(entryPath: string, key: string, index: ConsolidatedIndex): Promise<boolean> {
    try {
      const stats = await fs.stat(entryPath);
      const content = await fs.readFile(entryPath);
      index.set(key, { content, lastUsed: stats.mtime });
    } catch (error) {
      this.diagnostics.warning({
        code: CacheErrorCode.MIGRATION_FAILED,
        message: `Error reading file: ${ErrorHandler.formatError(error)}`,
        path: entryPath,
        cause: error
      });
      return false;
    }

    // 内容已经进入索引，文件不再需要
    try {
      await fs.unlink(entryPath);
    } catch (error) {
      this.diagnostics.warning({
        code: CacheErrorCode.MIGRATION_FAILED,
        message: `Error deleting file: ${ErrorHandler.formatError(error)}`,
        path: entryPath,
        cause: error
      });
    }
    return true;
  }

  private async removeShardDirectories(): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.root, { withFileTypes: true });
    } catch (error) {
      throw ErrorHandler.fromFileSystemError(error, 'Listing cache root', this.root, CacheErrorCode.CLEANUP_FAILED);
    }

    for (const entry of entries) {
      if (!entry.isDirectory() || !SHARD_DIR_PATTERN.test(entry.name)) {
        continue;
      }
      const shardPath = path.join(this.root, entry.name);
      try {
        await fs.remove(shardPath);
      } catch (error) {
        throw ErrorHandler.fromFileSystemError(error, 'Deleting shard directory', shardPath, CacheErrorCode.CLEANUP_FAILED);
      }
    }
  }

  /**
   * 保留 now - lastUsed <= window 的条目（边界包含）
   */
  private evict(index: ConsolidatedIndex, windowMs: number): ConsolidatedIndex {
    const now = this.now().getTime();
    const kept: ConsolidatedIndex = new Map();
    for (const [key, entry] of index) {
      if (now - entry.lastUsed.getTime() <= windowMs) {
        kept.set(key, entry);
      }
    }
    return kept;
  }
}

function isIndexFile(name: string): boolean {
  return name === ENTRIES_FILE || name.startsWith(`${ENTRIES_FILE}.`);
}
