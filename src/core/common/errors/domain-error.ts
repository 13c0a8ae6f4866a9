// src/core/common/errors/domain-error.ts
// 领域错误与错误码：跨层共享的核心错误定义

/**
 * 领域错误类
 * 用于表示业务逻辑层的错误，可在 Service、Usecase 和 Adapter 层之间传递
 */
export class DomainError extends Error {
  readonly code: string;
  readonly details?: unknown;
  readonly cause?: unknown;

  constructor(code: string, message: string, details?: unknown, cause?: unknown) {
    super(message);
    this.name = 'DomainError';
    this.code = code;
    this.details = details;
    this.cause = cause;

    // 兼容某些编译目标/测试环境的原型链问题，确保 instanceof 正常
    Object.setPrototypeOf(this, new.target.prototype);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DomainError);
    }
  }

  toJSON() {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

// 表格视图状态相关错误码（排序 / 配置 / 数据查询）
export const TABLE_VIEW_ERROR = {
  INVALID_CONFIG: 'TABLE_VIEW_INVALID_CONFIG',
  SORT_FIELD_NOT_ALLOWED: 'SORT_FIELD_NOT_ALLOWED',
  DB_QUERY_FAILED: 'DB_QUERY_FAILED',
} as const;
Object.freeze(TABLE_VIEW_ERROR);

// 导出相关错误码
export const EXPORT_ERROR = {
  FORMAT_NOT_SUPPORTED: 'EXPORT_FORMAT_NOT_SUPPORTED',
  EXPORTER_NOT_CONFIGURED: 'EXPORTER_NOT_CONFIGURED',
  EXPORT_FAILED: 'EXPORT_FAILED',
} as const;
Object.freeze(EXPORT_ERROR);

// 类型守卫：统一判断是否为领域错误（兼容多包/反序列化场景）
export const isDomainError = (error: unknown): error is DomainError => {
  if (error instanceof DomainError) return true;
  if (!error || typeof error !== 'object') return false;
  return (
    'name' in error &&
    error.name === 'DomainError' &&
    'code' in error &&
    typeof error.code === 'string'
  );
};
