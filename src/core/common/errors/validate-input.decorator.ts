// src/core/common/errors/validate-input.decorator.ts

import type { ExceptionPayload } from '@app-types/errors/exception-payload';
import { BadRequestException, UsePipes, ValidationPipe } from '@nestjs/common';
import { ValidationError } from 'class-validator';
import { formatValidationErrors } from './validation.formatter';

export const INPUT_VALIDATION_FAILED = 'INPUT_VALIDATION_FAILED';

/**
 * GraphQL 输入的校验管道
 * - 拒绝未声明的字段（查询串、导出格式之外的任何输入）
 * - 失败时抛出带业务错误码的 BadRequestException，由全局过滤器转为 BAD_USER_INPUT
 */
export function createInputValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    stopAtFirstError: false,
    validationError: { target: false, value: false },
    exceptionFactory: (errors: ValidationError[]) => {
      const payload: ExceptionPayload = {
        errorCode: INPUT_VALIDATION_FAILED,
        errorMessage: formatValidationErrors(errors),
      };
      return new BadRequestException(payload);
    },
  });
}

// eslint-disable-next-line @typescript-eslint/naming-convention
export const ValidateInput = () => UsePipes(createInputValidationPipe());
