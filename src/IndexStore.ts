/**
 * 合并索引的读写
 * 整个索引保存为缓存根目录下的一个 JSON 文件，每次修改都整体重写
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import { isUtf8 } from 'buffer';
import { CacheErrorCode, ErrorHandler } from './errorHandler.js';
import { isDigestKey } from './PathResolver.js';
import type { CacheEntry, ConsolidatedIndex, DiagnosticsSink, IndexSnapshot } from './types.js';

export const ENTRIES_FILE = 'entries.json';

interface IndexEntryDocument {
  content?: string;
  encoding?: 'base64';
  last_used: string;
}

export class IndexStore {
  constructor(
    private readonly indexPath: string,
    private readonly diagnostics: DiagnosticsSink
  ) {}

  static forRoot(root: string, diagnostics: DiagnosticsSink): IndexStore {
    return new IndexStore(path.join(root, ENTRIES_FILE), diagnostics);
  }

  get path(): string {
    return this.indexPath;
  }

  /**
   * 读取索引。文件不存在时返回空索引；读取或解析失败时上报警告并返回空索引，不抛出
   */
  async load(): Promise<ConsolidatedIndex> {
    return (await this.read()).index;
  }

  /**
   * 同 load，另外报告索引是否完整读入。文件不存在算完整
   */
  async read(): Promise<IndexSnapshot> {
    let raw: string;
    try {
      raw = await fs.readFile(this.indexPath, 'utf8');
    } catch (error) {
      if (!ErrorHandler.isNotFound(error)) {
        this.diagnostics.warning({
          code: CacheErrorCode.INDEX_READ_FAILED,
          message: `Error reading cache index: ${ErrorHandler.formatError(error)}`,
          path: this.indexPath,
          cause: error
        });
        return { index: new Map(), intact: false };
      }
      return { index: new Map(), intact: true };
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      this.diagnostics.warning({
        code: CacheErrorCode.INDEX_CORRUPT,
        message: `Error decoding cache index: ${ErrorHandler.formatError(error)}`,
        path: this.indexPath,
        cause: error
      });
      return { index: new Map(), intact: false };
    }

    if (!isRecord(document)) {
      this.diagnostics.warning({
        code: CacheErrorCode.INDEX_CORRUPT,
        message: 'Error decoding cache index: top level must be a JSON object',
        path: this.indexPath
      });
      return { index: new Map(), intact: false };
    }

    const index: ConsolidatedIndex = new Map();
    let intact = true;
    for (const [key, value] of Object.entries(document)) {
      const entry = isDigestKey(key) ? decodeEntry(value) : null;
      if (entry) {
        index.set(key, entry);
      } else {
        intact = false;
        this.diagnostics.warning({
          code: CacheErrorCode.INDEX_ENTRY_INVALID,
          message: `Skipping malformed cache index entry "${key}"`,
          path: this.indexPath
        });
      }
    }
    return { index, intact };
  }

  /**
   * 整体写入索引：先写临时文件再重命名替换
   */
  async save(index: ConsolidatedIndex): Promise<void> {
    const tempPath = `${this.indexPath}.${process.pid}.tmp`;
    try {
      await fs.ensureDir(path.dirname(this.indexPath));
      await fs.writeFile(tempPath, serializeIndex(index), 'utf8');
      await fs.rename(tempPath, this.indexPath);
    } catch (error) {
      await this.discardTempFile(tempPath);
      throw ErrorHandler.fromFileSystemError(error, 'Writing cache index', this.indexPath);
    }
  }

  private async discardTempFile(tempPath: string): Promise<void> {
    try {
      await fs.remove(tempPath);
    } catch (error) {
      this.diagnostics.warning({
        code: CacheErrorCode.INDEX_WRITE_FAILED,
        message: `Could not remove temporary index file: ${ErrorHandler.formatError(error)}`,
        path: tempPath,
        cause: error
      });
    }
  }
}

/**
 * 按键排序、两空格缩进，方便手工查看和 diff
 */
export function serializeIndex(index: ConsolidatedIndex): string {
  const keys = [...index.keys()].sort();
  if (keys.length === 0) {
    return '{}\n';
  }

  // 逐键拼接：纯数字的键在普通对象里会被提前，无法保持排序
  const lines = keys.map((key) => {
    const entry = index.get(key);
    const body = JSON.stringify(entry ? encodeEntry(entry) : {}, null, 2).replace(/\n/g, '\n  ');
    return `  ${JSON.stringify(key)}: ${body}`;
  });
  return `{\n${lines.join(',\n')}\n}\n`;
}

export function encodeEntry(entry: CacheEntry): IndexEntryDocument {
  const document: IndexEntryDocument = { last_used: entry.lastUsed.toISOString() };
  if (entry.content.length === 0) {
    return document;
  }

  if (isUtf8(entry.content)) {
    return { content: entry.content.toString('utf8'), ...document };
  }
  return { content: entry.content.toString('base64'), encoding: 'base64', ...document };
}

export function decodeEntry(value: unknown): CacheEntry | null {
  if (!isRecord(value)) {
    return null;
  }

  const { content, encoding, last_used: lastUsedRaw } = value;
  if (typeof lastUsedRaw !== 'string') {
    return null;
  }
  const lastUsed = new Date(lastUsedRaw);
  if (Number.isNaN(lastUsed.getTime())) {
    return null;
  }

  let text = '';
  if (typeof content === 'string') {
    text = content;
  } else if (content !== undefined) {
    return null;
  }
  if (encoding !== undefined && encoding !== 'base64') {
    return null;
  }

  return {
    content: encoding === 'base64' ? Buffer.from(text, 'base64') : Buffer.from(text, 'utf8'),
    lastUsed
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
