/**
 * 配置加载
 * 优先级：调用方显式覆盖 > 环境变量 > 配置文件 > 默认值
 */

import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { CacheError, CacheErrorCode, ErrorHandler } from './errorHandler.js';
import type { DigestCacheConfig, LogLevelName } from './types.js';

export interface ConfigValidationRule {
  field: keyof DigestCacheConfig;
  validator: (value: unknown) => true | string;
}

export interface ConfigSources {
  /** 显式覆盖，例如命令行参数 */
  overrides?: Partial<DigestCacheConfig>;
  env?: NodeJS.ProcessEnv;
  /** 配置文件路径；缺省取 CONFIG_PATH，再缺省取工作目录下的 config.json */
  configPath?: string;
  cwd?: string;
  homeDir?: string;
}

const LOG_LEVELS: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];

export const DEFAULT_RETENTION_WEEKS = 4;

export function defaultCacheRoot(homeDir: string = os.homedir()): string {
  return path.join(homeDir, '.digest-cache', 'cache');
}

const validationRules: ConfigValidationRule[] = [
  {
    field: 'cacheRoot',
    validator: (value) => (typeof value === 'string' && value.trim().length > 0) || '缓存根目录必须是非空字符串'
  },
  {
    field: 'retentionWeeks',
    validator: (value) =>
      (typeof value === 'number' && Number.isInteger(value) && value >= 0) || '保留周数必须是非负整数'
  },
  {
    field: 'logLevel',
    validator: (value) =>
      (typeof value === 'string' && isLogLevel(value)) || `日志级别必须是 ${LOG_LEVELS.join('/')} 之一`
  }
];

export class ConfigManager {
  private readonly env: NodeJS.ProcessEnv;
  private readonly cwd: string;
  private readonly homeDir: string;
  private readonly configPath: string;

  constructor(private readonly sources: ConfigSources = {}) {
    this.env = sources.env ?? process.env;
    this.cwd = sources.cwd ?? process.cwd();
    this.homeDir = sources.homeDir ?? os.homedir();
    this.configPath = path.resolve(this.cwd, sources.configPath ?? this.env.CONFIG_PATH ?? 'config.json');
  }

  /**
   * 合并各个来源并验证，结果只在进程启动时解析一次
   */
  async load(): Promise<DigestCacheConfig> {
    const fileConfig = await this.readConfigFile();
    const envConfig = this.readEnvironment();

    const merged: Record<keyof DigestCacheConfig, unknown> = {
      cacheRoot: defaultCacheRoot(this.homeDir),
      retentionWeeks: DEFAULT_RETENTION_WEEKS,
      logLevel: 'info'
    };
    for (const layer of [fileConfig, envConfig, this.sources.overrides ?? {}]) {
      for (const [field, value] of Object.entries(layer)) {
        if (value !== undefined && isConfigField(field)) {
          merged[field] = value;
        }
      }
    }

    const problems = this.validate(merged);
    if (problems.length > 0) {
      throw new CacheError(
        CacheErrorCode.CONFIGURATION_ERROR,
        `配置验证失败: ${problems.join('; ')}`,
        { problems }
      );
    }

    const { cacheRoot, retentionWeeks, logLevel } = merged;
    if (typeof cacheRoot !== 'string' || typeof retentionWeeks !== 'number' || typeof logLevel !== 'string' || !isLogLevel(logLevel)) {
      throw new CacheError(CacheErrorCode.CONFIGURATION_ERROR, '配置验证失败');
    }

    return {
      cacheRoot: path.resolve(this.cwd, cacheRoot),
      retentionWeeks,
      logLevel
    };
  }

  validate(config: Record<string, unknown>): string[] {
    const problems: string[] = [];
    for (const rule of validationRules) {
      const result = rule.validator(config[rule.field]);
      if (result !== true) {
        problems.push(`${rule.field}: ${result}`);
      }
    }
    return problems;
  }

  private async readConfigFile(): Promise<Record<string, unknown>> {
    if (!(await fs.pathExists(this.configPath))) {
      return {};
    }

    let raw: string;
    try {
      raw = await fs.readFile(this.configPath, 'utf8');
    } catch (error) {
      throw ErrorHandler.fromFileSystemError(error, 'Reading config file', this.configPath, CacheErrorCode.CONFIGURATION_ERROR);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new CacheError(
        CacheErrorCode.CONFIGURATION_ERROR,
        `配置文件不是有效的 JSON: ${this.configPath}`,
        { path: this.configPath, cause: error }
      );
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new CacheError(
        CacheErrorCode.CONFIGURATION_ERROR,
        `配置文件顶层必须是对象: ${this.configPath}`,
        { path: this.configPath }
      );
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  private readEnvironment(): Partial<Record<keyof DigestCacheConfig, unknown>> {
    const config: Partial<Record<keyof DigestCacheConfig, unknown>> = {};

    if (this.env.DIGEST_CACHE_DIR) {
      config.cacheRoot = this.env.DIGEST_CACHE_DIR;
    }
    if (this.env.DIGEST_CACHE_RETENTION_WEEKS) {
      // 非数字会变成 NaN，交给验证规则报告
      config.retentionWeeks = Number(this.env.DIGEST_CACHE_RETENTION_WEEKS);
    }
    if (this.env.DIGEST_CACHE_LOG_LEVEL) {
      config.logLevel = this.env.DIGEST_CACHE_LOG_LEVEL.toLowerCase();
    }
    return config;
  }
}

function isLogLevel(value: string): value is LogLevelName {
  return LOG_LEVELS.some((level) => level === value);
}

function isConfigField(field: string): field is keyof DigestCacheConfig {
  return field === 'cacheRoot' || field === 'retentionWeeks' || field === 'logLevel';
}
