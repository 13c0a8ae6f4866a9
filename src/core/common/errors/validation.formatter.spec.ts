// src/core/common/errors/validation.formatter.spec.ts
import { ValidationError } from 'class-validator';
import { formatValidationErrors } from './validation.formatter';

const validationError = (
  property: string,
  constraints?: Record<string, string>,
  children: ValidationError[] = [],
): ValidationError => Object.assign(new ValidationError(), { property, constraints, children });

describe('formatValidationErrors', () => {
  it('顶层字段只输出消息', () => {
    expect(
      formatValidationErrors([
        validationError('format', {
          isNotEmpty: '导出格式不能为空',
          maxLength: '导出格式长度不能超过 16 个字符',
        }),
      ]),
    ).toBe('导出格式不能为空; 导出格式长度不能超过 16 个字符');
  });

  it('嵌套字段带属性路径，重复消息只保留一条', () => {
    expect(
      formatValidationErrors([
        validationError('input', undefined, [
          validationError('query', { isString: '查询串必须是字符串' }),
        ]),
        validationError('format', { isString: '导出格式必须是字符串' }),
        validationError('format', { isString: '导出格式必须是字符串' }),
      ]),
    ).toBe('input.query: 查询串必须是字符串; 导出格式必须是字符串');
  });
});
