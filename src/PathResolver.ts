/**
 * 摘要与分片路径之间的映射
 * root/ab/cd/ef0123... : 前两段各取两个十六进制字符，剩余部分作为文件名
 */

import * as path from 'path';
import { CacheError, CacheErrorCode } from './errorHandler.js';
import type { Digest, EntryPath } from './types.js';

export const MIN_DIGEST_HEX_LENGTH = 5;

const HEX_PATTERN = /^[0-9a-f]+$/;
const SHARD_SEGMENT_PATTERN = /^[0-9a-f]{2}$/;

export function digestToHex(digest: Digest): string {
  return Buffer.from(digest.buffer, digest.byteOffset, digest.byteLength).toString('hex');
}

/**
 * 解析调用方传入的十六进制摘要（大小写均可）
 */
export function digestFromHex(hex: string): Buffer {
  const normalized = hex.trim().toLowerCase();
  if (normalized.length % 2 !== 0 || !HEX_PATTERN.test(normalized)) {
    throw new CacheError(
      CacheErrorCode.INVALID_DIGEST,
      `Digest must be an even-length hex string, got "${hex}"`,
      { digest: hex }
    );
  }
  const digest = Buffer.from(normalized, 'hex');
  assertDigestLength(normalized);
  return digest;
}

/**
 * 索引键是否为合法的十六进制摘要
 */
export function isDigestKey(key: string): boolean {
  return key.length >= MIN_DIGEST_HEX_LENGTH && HEX_PATTERN.test(key);
}

/**
 * 校验摘要长度并返回索引键
 */
export function digestKey(digest: Digest): string {
  const hex = digestToHex(digest);
  assertDigestLength(hex);
  return hex;
}

export function resolveEntryPath(root: string, digest: Digest): EntryPath {
  const hex = digestKey(digest);

  const shardDir = path.join(root, hex.slice(0, 2), hex.slice(2, 4));
  return { shardDir, entryPath: path.join(shardDir, hex.slice(4)) };
}

/**
 * 由分片文件路径还原十六进制摘要；路径不在根目录下第三层或段名不合法时返回 null
 */
export function digestKeyFromEntryPath(root: string, entryPath: string): string | null {
  const relative = path.relative(root, entryPath);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    return null;
  }

  const segments = relative.split(path.sep);
  if (segments.length !== 3) {
    return null;
  }

  const [first, second, rest] = segments;
  if (!SHARD_SEGMENT_PATTERN.test(first) || !SHARD_SEGMENT_PATTERN.test(second) || !HEX_PATTERN.test(rest)) {
    return null;
  }
  return `${first}${second}${rest}`;
}

function assertDigestLength(hex: string): void {
  if (hex.length < MIN_DIGEST_HEX_LENGTH) {
    throw new CacheError(
      CacheErrorCode.INVALID_DIGEST,
      `Digest must encode to at least ${MIN_DIGEST_HEX_LENGTH} hex characters, got ${hex.length}`,
      { digest: hex }
    );
  }
}
