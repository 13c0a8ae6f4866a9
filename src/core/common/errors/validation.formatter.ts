// src/core/common/errors/validation.formatter.ts

import { ValidationError } from 'class-validator';

/**
 * 展开 class-validator 的错误树
 * 嵌套字段的消息带上属性路径前缀，如 "input.query: 查询串必须是字符串"
 */
function collectMessages(errors: ReadonlyArray<ValidationError>, parentPath?: string): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) =>
      parentPath ? `${path}: ${message}` : message,
    );
    const nested = error.children?.length ? collectMessages(error.children, path) : [];
    return [...own, ...nested];
  });
}

/**
 * 格式化验证错误消息（去重后以分号连接）
 * @param errors 验证错误数组
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return [...new Set(collectMessages(errors))].join('; ');
}
