// src/core/common/errors/index.ts
// 领域错误统一入口；校验装饰器依赖 Nest，需从各自文件导入

export {
  DomainError,
  EXPORT_ERROR,
  isDomainError,
  TABLE_VIEW_ERROR,
} from './domain-error';
