import type { CacheErrorCode } from './errorHandler.js';

/** 调用方提供的不透明摘要，缓存只把它当作标识 */
export type Digest = Uint8Array;

export interface CacheEntry {
  content: Buffer;  // 空内容与缺省等价
  lastUsed: Date;
}

/** 十六进制摘要 -> 条目 */
export type ConsolidatedIndex = Map<string, CacheEntry>;

/** intact 为 false 表示读取或解析时丢弃过内容，不能据此整体重写索引文件 */
export interface IndexSnapshot {
  index: ConsolidatedIndex;
  intact: boolean;
}

export interface EntryPath {
  shardDir: string;
  entryPath: string;
}

export interface CacheStats {
  indexHits: number;
  shardHits: number;
  misses: number;
  saves: number;
  hitRate: number;
}

export interface PruneReport {
  root: string;
  scanned: number;
  migrated: number;
  removed: number;
  kept: number;
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface DigestCacheConfig {
  cacheRoot: string;
  retentionWeeks: number;
  logLevel: LogLevelName;
}

export interface CacheWarning {
  code: CacheErrorCode;
  message: string;
  path?: string;
  cause?: unknown;
}

/**
 * 诊断输出通道
 * 逐文件迁移失败、索引损坏等可恢复问题通过它上报，而不是直接写控制台
 */
export interface DiagnosticsSink {
  warning(event: CacheWarning): void;
  info(message: string): void;
}
