export enum CacheErrorCode {
  // 通用错误 (1000-1999)
  UNKNOWN_ERROR = 1000,
  INVALID_INPUT = 1001,
  CONFIGURATION_ERROR = 1002,
  INVALID_DIGEST = 1003,

  // 索引错误 (2000-2999)
  INDEX_CORRUPT = 2000,
  INDEX_READ_FAILED = 2001,
  INDEX_WRITE_FAILED = 2002,
  INDEX_ENTRY_INVALID = 2003,

  // 维护错误 (3000-3999)
  MIGRATION_FAILED = 3000,
  CLEANUP_FAILED = 3001,
  UNEXPECTED_FILE = 3002,

  // 系统错误 (5000-5999)
  FILE_SYSTEM_ERROR = 5000
}

export class CacheError extends Error {
  public readonly code: CacheErrorCode;
  public readonly details: Record<string, unknown>;
  public readonly timestamp: number;

  constructor(
    code: CacheErrorCode,
    message: string,
    details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'CacheError';
    this.code = code;
    this.details = details;
    this.timestamp = Date.now();

    // 保持原型链
    Object.setPrototypeOf(this, CacheError.prototype);
  }

  toString(): string {
    return `[CacheError ${this.code}] ${this.message}`;
  }
}

/**
 * 错误辅助方法
 */
export class ErrorHandler {
  /**
   * 创建缓存错误
   */
  static createError(
    code: CacheErrorCode,
    message: string,
    details: Record<string, unknown> = {}
  ): CacheError {
    return new CacheError(code, message, details);
  }

  /**
   * 把文件系统异常包装为缓存错误，保留 errno 代码和原始异常
   */
  static fromFileSystemError(
    error: unknown,
    operation: string,
    filePath: string,
    code: CacheErrorCode = CacheErrorCode.FILE_SYSTEM_ERROR
  ): CacheError {
    if (ErrorHandler.isCacheError(error)) {
      return error;
    }

    return new CacheError(
      code,
      `${operation} failed for ${filePath}: ${ErrorHandler.describe(error)}`,
      { operation, path: filePath, errno: ErrorHandler.errnoCode(error), cause: error }
    );
  }

  /**
   * 文件或其上级目录不存在
   */
  static isNotFound(error: unknown): boolean {
    const errno = ErrorHandler.errnoCode(error);
    return errno === 'ENOENT' || errno === 'ENOTDIR';
  }

  static errnoCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
      return error.code;
    }
    return undefined;
  }

  /**
   * 取出异常消息。fs 抛出的异常可能来自另一个 realm，不能用 instanceof Error 判断
   */
  static messageOf(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
      return error.message;
    }
    return undefined;
  }

  /**
   * 格式化错误消息
   */
  static formatError(error: unknown): string {
    if (error instanceof CacheError) {
      return error.toString();
    }

    const message = ErrorHandler.messageOf(error);
    return message === undefined ? `[Unknown Error] ${String(error)}` : `[Error] ${message}`;
  }

  /**
   * 判断是否为缓存错误
   */
  static isCacheError(error: unknown): error is CacheError {
    return error instanceof CacheError;
  }

  /**
   * 判断是否为特定类型的错误
   */
  static isErrorCode(error: unknown, code: CacheErrorCode): boolean {
    return ErrorHandler.isCacheError(error) && error.code === code;
  }

  private static describe(error: unknown): string {
    return ErrorHandler.messageOf(error) ?? String(error);
  }
}

/**
 * 工具函数：包装异步操作，未知异常统一转换为缓存错误
 */
export async function withErrorHandling<T>(
  operation: () => Promise<T>,
  context: Record<string, unknown> = {}
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (ErrorHandler.isCacheError(error)) {
      // 已知的缓存错误，直接重新抛出
      throw error;
    }

    throw ErrorHandler.createError(
      CacheErrorCode.UNKNOWN_ERROR,
      ErrorHandler.formatError(error),
      { ...context, originalError: error }
    );
  }
}
