/**
 * 输入验证工具集
 * 工具参数和命令行参数在接触磁盘之前先经过这里
 */

import { MIN_DIGEST_HEX_LENGTH } from './PathResolver.js';

export interface ValidationError {
  field: string;
  message: string;
  received?: unknown;
}

export class ValidationResult<T = undefined> {
  constructor(
    public isValid: boolean,
    public errors: ValidationError[] = [],
    public value?: T
  ) {}

  static success<T = undefined>(value?: T): ValidationResult<T> {
    return new ValidationResult<T>(true, [], value);
  }

  static error<T = undefined>(errors: ValidationError[]): ValidationResult<T> {
    return new ValidationResult<T>(false, errors);
  }

  static singleError<T = undefined>(field: string, message: string, received?: unknown): ValidationResult<T> {
    return new ValidationResult<T>(false, [{ field, message, received }]);
  }
}

export type ContentEncoding = 'utf8' | 'base64';

export interface FindArgs {
  digest: string;
  encoding: ContentEncoding;
}

export interface SaveArgs {
  digest: string;
  content: string;
  encoding: ContentEncoding;
}

export interface PruneArgs {
  weeks?: number;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * 验证字符串参数
 */
export function validateString(
  value: unknown,
  field: string,
  options: {
    required?: boolean;
    minLength?: number;
    maxLength?: number;
    pattern?: RegExp;
  } = {}
): ValidationResult {
  const { required = true, minLength, maxLength, pattern } = options;
  const errors: ValidationError[] = [];

  // 检查是否为必需字段
  if (value === undefined || value === null) {
    return required
      ? ValidationResult.singleError(field, '字段是必需的', value)
      : ValidationResult.success();
  }

  if (typeof value !== 'string') {
    return ValidationResult.singleError(field, '必须是字符串类型', typeof value);
  }

  if (minLength !== undefined && value.length < minLength) {
    errors.push({ field, message: `长度不能少于${minLength}个字符`, received: value.length });
  }

  if (maxLength !== undefined && value.length > maxLength) {
    errors.push({ field, message: `长度不能超过${maxLength}个字符`, received: value.length });
  }

  if (pattern && !pattern.test(value)) {
    errors.push({ field, message: '格式不符合要求', received: value });
  }

  return errors.length > 0 ? ValidationResult.error(errors) : ValidationResult.success();
}

/**
 * 验证数字参数
 */
export function validateNumber(
  value: unknown,
  field: string,
  options: {
    required?: boolean;
    min?: number;
    max?: number;
    integer?: boolean;
  } = {}
): ValidationResult {
  const { required = true, min, max, integer = false } = options;
  const errors: ValidationError[] = [];

  if (value === undefined || value === null) {
    return required
      ? ValidationResult.singleError(field, '字段是必需的', value)
      : ValidationResult.success();
  }

  if (typeof value !== 'number' || Number.isNaN(value)) {
    return ValidationResult.singleError(
      field,
      '必须是有效数字',
      typeof value === 'number' ? 'NaN' : typeof value
    );
  }

  if (integer && !Number.isInteger(value)) {
    errors.push({ field, message: '必须是整数', received: value });
  }

  if (min !== undefined && value < min) {
    errors.push({ field, message: `不能小于${min}`, received: value });
  }

  if (max !== undefined && value > max) {
    errors.push({ field, message: `不能大于${max}`, received: value });
  }

  return errors.length > 0 ? ValidationResult.error(errors) : ValidationResult.success();
}

/**
 * 验证十六进制摘要
 */
export function validateDigestHex(value: unknown, field: string = 'digest'): ValidationResult<string> {
  const base = validateString(value, field, {
    minLength: MIN_DIGEST_HEX_LENGTH,
    pattern: /^[0-9a-fA-F]+$/
  });
  if (!base.isValid || typeof value !== 'string') {
    return ValidationResult.error(base.errors);
  }
  if (value.length % 2 !== 0) {
    return ValidationResult.singleError(field, '长度必须为偶数', value.length);
  }
  return ValidationResult.success(value.toLowerCase());
}

/**
 * 验证保留周数（非负整数）
 */
export function validateRetentionWeeks(value: unknown, field: string = 'weeks'): ValidationResult<number> {
  const result = validateNumber(value, field, { min: 0, max: 520, integer: true });
  if (!result.isValid || typeof value !== 'number') {
    return ValidationResult.error(result.errors);
  }
  return ValidationResult.success(value);
}

function validateEncoding(value: unknown): ValidationResult<ContentEncoding> {
  if (value === undefined || value === 'utf8') {
    return ValidationResult.success<ContentEncoding>('utf8');
  }
  if (value === 'base64') {
    return ValidationResult.success<ContentEncoding>('base64');
  }
  return ValidationResult.singleError('encoding', '只能是 utf8 或 base64', value);
}

/**
 * 验证查找操作参数
 */
export function validateFindArgs(args: unknown): ValidationResult<FindArgs> {
  if (!isRecord(args)) {
    return ValidationResult.singleError('arguments', '参数必须是对象');
  }

  const digest = validateDigestHex(args.digest);
  const encoding = validateEncoding(args.encoding);
  if (digest.value === undefined || encoding.value === undefined) {
    return ValidationResult.error([...digest.errors, ...encoding.errors]);
  }
  return ValidationResult.success({ digest: digest.value, encoding: encoding.value });
}

/**
 * 验证保存操作参数
 */
export function validateSaveArgs(args: unknown): ValidationResult<SaveArgs> {
  if (!isRecord(args)) {
    return ValidationResult.singleError('arguments', '参数必须是对象');
  }

  const digest = validateDigestHex(args.digest);
  const encoding = validateEncoding(args.encoding);
  const errors: ValidationError[] = [...digest.errors, ...encoding.errors];

  const content = validateString(args.content, 'content', {
    pattern: encoding.value === 'base64' ? BASE64_PATTERN : undefined
  });
  errors.push(...content.errors);

  if (
    errors.length > 0 ||
    digest.value === undefined ||
    encoding.value === undefined ||
    typeof args.content !== 'string'
  ) {
    return ValidationResult.error(errors);
  }
  return ValidationResult.success({ digest: digest.value, content: args.content, encoding: encoding.value });
}

/**
 * 验证维护操作参数；weeks 可省略，由配置提供默认值
 */
export function validatePruneArgs(args: unknown): ValidationResult<PruneArgs> {
  if (args === undefined) {
    return ValidationResult.success({});
  }
  if (!isRecord(args)) {
    return ValidationResult.singleError('arguments', '参数必须是对象');
  }
  if (args.weeks === undefined) {
    return ValidationResult.success({});
  }

  const weeks = validateRetentionWeeks(args.weeks);
  if (weeks.value === undefined) {
    return ValidationResult.error(weeks.errors);
  }
  return ValidationResult.success({ weeks: weeks.value });
}

/**
 * 格式化验证错误信息
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors
    .map((err) => `${err.field}: ${err.message}${err.received !== undefined ? ` (收到: ${String(err.received)})` : ''}`)
    .join('; ');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
