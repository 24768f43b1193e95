/**
 * 分片文件存储：每个摘要一个文件，内容即原始字节，没有任何元数据
 */

import * as fs from 'fs-extra';
import { ErrorHandler } from './errorHandler.js';
import { resolveEntryPath } from './PathResolver.js';
import type { Digest } from './types.js';

export class ShardedFileStore {
  constructor(private readonly root: string) {}

  /**
   * 读取条目；文件不存在返回 null，其他 I/O 错误抛出
   */
  async read(digest: Digest): Promise<Buffer | null> {
    const { entryPath } = resolveEntryPath(this.root, digest);
    try {
      return await fs.readFile(entryPath);
    } catch (error) {
      if (ErrorHandler.isNotFound(error)) {
        return null;
      }
      throw ErrorHandler.fromFileSystemError(error, 'Reading cache entry', entryPath);
    }
  }

  async write(digest: Digest, content: Uint8Array): Promise<void> {
    const { shardDir, entryPath } = resolveEntryPath(this.root, digest);
    try {
      // mkdir -p 对并发创建者是幂等的
      await fs.ensureDir(shardDir);
      await fs.writeFile(entryPath, content);
    } catch (error) {
      throw ErrorHandler.fromFileSystemError(error, 'Writing cache entry', entryPath);
    }
  }

  /**
   * 删除松散文件；文件已不存在时不算错误
   */
  async remove(digest: Digest): Promise<void> {
    const { entryPath } = resolveEntryPath(this.root, digest);
    try {
      await fs.unlink(entryPath);
    } catch (error) {
      if (!ErrorHandler.isNotFound(error)) {
        throw ErrorHandler.fromFileSystemError(error, 'Deleting cache entry', entryPath);
      }
    }
  }
}
