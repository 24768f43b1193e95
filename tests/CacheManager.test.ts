import * as fs from 'fs-extra';
import * as path from 'path';
import { CacheManager } from '../src/CacheManager';
import { CacheErrorCode } from '../src/errorHandler';
import { ENTRIES_FILE } from '../src/IndexStore';
import { hexDigest, makeTempRoot, recordingDiagnostics, warningCodes, type RecordingDiagnostics } from './helpers';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('CacheManager', () => {
  let root: string;
  let diagnostics: RecordingDiagnostics;
  let now: Date;
  let cacheManager: CacheManager;

  const readIndexDocument = async (): Promise<Record<string, { content?: string; last_used: string }>> =>
    JSON.parse(await fs.readFile(path.join(root, ENTRIES_FILE), 'utf8'));

  beforeEach(async () => {
    root = await makeTempRoot();
    diagnostics = recordingDiagnostics();
    now = new Date('2026-10-19T12:00:00.000Z');
    cacheManager = new CacheManager({ root, diagnostics, now: () => now });
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  describe('基础操作', () => {
    test('未保存过的摘要应该返回 undefined 且不报错', async () => {
      expect(await cacheManager.find(hexDigest('ab01cdef'))).toBeUndefined();
      expect(await fs.pathExists(path.join(root, ENTRIES_FILE))).toBe(false);
      expect(diagnostics.warning).not.toHaveBeenCalled();
    });

    test('保存后应该能查到相同内容', async () => {
      await cacheManager.save(hexDigest('ab01cd'), Buffer.from('hello'));

      const content = await cacheManager.find(hexDigest('ab01cd'));

      expect(content?.toString('utf8')).toBe('hello');
    });

    test('save 只写分片文件，不写索引', async () => {
      await cacheManager.save(hexDigest('ab01cd'), Buffer.from('hello'));

      expect(await fs.readFile(path.join(root, 'ab', '01', 'cd'), 'utf8')).toBe('hello');
      expect(await fs.pathExists(path.join(root, ENTRIES_FILE))).toBe(false);
    });

    test('空内容也是命中', async () => {
      await cacheManager.save(hexDigest('ab01cd'), Buffer.alloc(0));

      const content = await cacheManager.find(hexDigest('ab01cd'));

      expect(content?.length).toBe(0);
    });
  });

  describe('读时迁移', () => {
    test('分片命中后索引应该包含相同内容，松散文件被删除', async () => {
      await cacheManager.save(hexDigest('ab01cd'), Buffer.from('hello'));

      await cacheManager.find(hexDigest('ab01cd'));

      expect(await readIndexDocument()).toEqual({
        ab01cd: { content: 'hello', last_used: '2026-10-19T12:00:00.000Z' }
      });
      expect(await fs.pathExists(path.join(root, 'ab', '01', 'cd'))).toBe(false);
    });

    test('索引命中应该刷新 last_used', async () => {
      await fs.writeFile(
        path.join(root, ENTRIES_FILE),
        JSON.stringify({ ab01cd: { content: 'cached', last_used: '2026-09-01T00:00:00.000Z' } }),
        'utf8'
      );

      const content = await cacheManager.find(hexDigest('ab01cd'));

      expect(content?.toString('utf8')).toBe('cached');
      expect((await readIndexDocument()).ab01cd.last_used).toBe('2026-10-19T12:00:00.000Z');
    });

    test('只在前两个字符不同的摘要应该互不干扰', async () => {
      await cacheManager.save(hexDigest('aa1234'), Buffer.from('first'));
      await cacheManager.save(hexDigest('bb1234'), Buffer.from('second'));

      expect((await cacheManager.find(hexDigest('aa1234')))?.toString('utf8')).toBe('first');
      expect((await cacheManager.find(hexDigest('bb1234')))?.toString('utf8')).toBe('second');

      await cacheManager.prune(4);

      expect((await cacheManager.find(hexDigest('aa1234')))?.toString('utf8')).toBe('first');
      expect((await cacheManager.find(hexDigest('bb1234')))?.toString('utf8')).toBe('second');
    });

    test('索引优先于分片文件', async () => {
      await fs.writeFile(
        path.join(root, ENTRIES_FILE),
        JSON.stringify({ ab01cd: { content: 'from index', last_used: '2026-10-01T00:00:00.000Z' } }),
        'utf8'
      );
      await cacheManager.save(hexDigest('ab01cd'), Buffer.from('from shard'));

      expect((await cacheManager.find(hexDigest('ab01cd')))?.toString('utf8')).toBe('from index');
    });

    test('索引损坏时应该降级为分片查找并上报警告', async () => {
      await fs.writeFile(path.join(root, ENTRIES_FILE), 'not json at all', 'utf8');
      await cacheManager.save(hexDigest('ab01cd'), Buffer.from('hello'));

      const content = await cacheManager.find(hexDigest('ab01cd'));

      expect(content?.toString('utf8')).toBe('hello');
      expect(warningCodes(diagnostics)).toEqual([CacheErrorCode.INDEX_CORRUPT]);
      expect(await fs.readFile(path.join(root, ENTRIES_FILE), 'utf8')).toBe('not json at all');
      expect(await fs.pathExists(path.join(root, 'ab', '01', 'cd'))).toBe(true);
    });

    test('索引读取失败时分片命中不应该覆盖索引', async () => {
      await fs.ensureDir(path.join(root, ENTRIES_FILE));
      await cacheManager.save(hexDigest('dd0004'), Buffer.from('loose'));

      const content = await cacheManager.find(hexDigest('dd0004'));

      expect(content?.toString('utf8')).toBe('loose');
      expect(warningCodes(diagnostics)).toEqual([CacheErrorCode.INDEX_READ_FAILED]);
      expect((await fs.stat(path.join(root, ENTRIES_FILE))).isDirectory()).toBe(true);
      expect(await fs.pathExists(path.join(root, 'dd', '00', '04'))).toBe(true);
    });

    test('索引含有格式错误的条目时，查找不应该丢掉其余条目', async () => {
      const original = JSON.stringify({
        aa0001: { content: 'one', last_used: '2026-10-01T00:00:00.000Z' },
        bb0002: { content: 'two', last_used: '2026-10-01T00:00:00.000Z' },
        cc0003: { content: 'three', last_used: '2026-10-01T00:00:00.000Z' },
        ee0005: { content: 'broken' }
      });
      await fs.writeFile(path.join(root, ENTRIES_FILE), original, 'utf8');
      await cacheManager.save(hexDigest('dd0004'), Buffer.from('loose'));

      expect((await cacheManager.find(hexDigest('dd0004')))?.toString('utf8')).toBe('loose');
      expect((await cacheManager.find(hexDigest('aa0001')))?.toString('utf8')).toBe('one');

      expect(await fs.readFile(path.join(root, ENTRIES_FILE), 'utf8')).toBe(original);
      expect(warningCodes(diagnostics)).toEqual([
        CacheErrorCode.INDEX_ENTRY_INVALID,
        CacheErrorCode.INDEX_ENTRY_INVALID
      ]);
    });

    test('索引损坏后 prune 仍然迁移松散文件', async () => {
      await fs.writeFile(path.join(root, ENTRIES_FILE), 'not json at all', 'utf8');
      await cacheManager.save(hexDigest('ab01cd'), Buffer.from('hello'));
      await cacheManager.find(hexDigest('ab01cd'));

      await cacheManager.prune(4);

      expect(Object.keys(await readIndexDocument())).toEqual(['ab01cd']);
      expect(await fs.pathExists(path.join(root, 'ab'))).toBe(false);
    });

    test('索引损坏且未命中时返回 undefined 而不是抛出', async () => {
      await fs.writeFile(path.join(root, ENTRIES_FILE), 'not json at all', 'utf8');

      expect(await cacheManager.find(hexDigest('ab01cd'))).toBeUndefined();
      expect(warningCodes(diagnostics)).toEqual([CacheErrorCode.INDEX_CORRUPT]);
    });

    test('索引写入失败时仍返回内容并保留松散文件', async () => {
      await cacheManager.save(hexDigest('ab01cd'), Buffer.from('hello'));
      await fs.ensureDir(path.join(root, `${ENTRIES_FILE}.${process.pid}.tmp`));

      const content = await cacheManager.find(hexDigest('ab01cd'));

      expect(content?.toString('utf8')).toBe('hello');
      expect(warningCodes(diagnostics)).toEqual([CacheErrorCode.INDEX_WRITE_FAILED]);
      expect(await fs.pathExists(path.join(root, 'ab', '01', 'cd'))).toBe(true);
    });
  });

  describe('错误处理', () => {
    test('save 的 I/O 错误应该抛给调用方', async () => {
      await fs.writeFile(path.join(root, 'ab'), 'not a directory');

      await expect(cacheManager.save(hexDigest('ab01cd'), Buffer.from('x'))).rejects.toMatchObject({
        code: CacheErrorCode.FILE_SYSTEM_ERROR
      });
    });

    test('分片读取的 I/O 错误应该抛给调用方', async () => {
      await fs.ensureDir(path.join(root, 'ab', '01', 'cd'));

      await expect(cacheManager.find(hexDigest('ab01cd'))).rejects.toMatchObject({
        code: CacheErrorCode.FILE_SYSTEM_ERROR
      });
    });

    test('过短的摘要应该立即失败', async () => {
      await expect(cacheManager.find(hexDigest('ab01'))).rejects.toMatchObject({
        code: CacheErrorCode.INVALID_DIGEST
      });
      await expect(cacheManager.save(hexDigest('ab01'), Buffer.from('x'))).rejects.toMatchObject({
        code: CacheErrorCode.INVALID_DIGEST
      });
    });
  });

  describe('并发', () => {
    test('同一实例上的并发查找应该逐个执行', async () => {
      await cacheManager.save(hexDigest('ab01cd'), Buffer.from('hello'));

      const results = await Promise.all([
        cacheManager.find(hexDigest('ab01cd')),
        cacheManager.find(hexDigest('ab01cd'))
      ]);

      expect(results.map((result) => result?.toString('utf8'))).toEqual(['hello', 'hello']);
      expect(cacheManager.getStats()).toMatchObject({ shardHits: 1, indexHits: 1 });
    });
  });

  describe('统计', () => {
    test('应该正确统计命中率', async () => {
      await cacheManager.save(hexDigest('aa0001'), Buffer.from('one'));
      await cacheManager.save(hexDigest('bb0002'), Buffer.from('two'));

      await cacheManager.find(hexDigest('aa0001'));
      await cacheManager.find(hexDigest('aa0001'));
      await cacheManager.find(hexDigest('cc0003'));

      expect(cacheManager.getStats()).toEqual({
        indexHits: 1,
        shardHits: 1,
        misses: 1,
        saves: 2,
        hitRate: 66.67
      });
    });

    test('没有查找时命中率为 0', () => {
      expect(cacheManager.getStats().hitRate).toBe(0);
    });
  });

  test('完整流程：保存、查找、超出保留期后被淘汰', async () => {
    const digest = hexDigest('ab01cd');
    await cacheManager.save(digest, Buffer.from('hello'));
    expect((await cacheManager.find(digest))?.toString('utf8')).toBe('hello');

    now = new Date(now.getTime() + 10 * DAY_MS);
    const report = await cacheManager.prune(0);

    expect(report).toEqual({ root, scanned: 1, migrated: 0, removed: 1, kept: 0 });
    expect(await cacheManager.find(digest)).toBeUndefined();
  });
});
