// src/core/common/filters/graphql-exception.filter.ts
import { ExceptionPayload } from '@app-types/errors/exception-payload';
import { DomainError, EXPORT_ERROR, isDomainError, TABLE_VIEW_ERROR } from '@core/common/errors';
import { ArgumentsHost, Catch, HttpException } from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';
import { GqlArgumentsHost } from '@nestjs/graphql';
import { GraphQLError, GraphQLResolveInfo } from 'graphql';

/** 将 HTTP 状态码映射为 GraphQL 标准错误类别代码（extensions.code）
 *  注意：这是 GraphQL/Apollo 通用的大类，不是业务 errorCode（业务码放在 extensions.errorCode）
 */
function mapHttpToGqlCode(status: number): string {
  switch (status) {
    case 400:
    case 422:
      return 'BAD_USER_INPUT';
    case 401:
      return 'UNAUTHENTICATED';
    case 403:
      return 'FORBIDDEN';
    case 404:
      return 'NOT_FOUND';
    case 409:
      return 'CONFLICT';
    default:
      return 'INTERNAL_SERVER_ERROR';
  }
}

/** 将 HttpException.getResponse() 的返回值收窄为公共载荷类型 */
function toExceptionPayload(resp: string | object): string | ExceptionPayload {
  if (typeof resp === 'string') return resp;
  return { ...resp };
}

/** 从异常响应中提取错误信息 */
function extractPayload(resp: string | ExceptionPayload): {
  code?: string;
  errorCode?: string;
  errorMessage?: string;
  fallbackMsg?: string;
} {
  if (typeof resp === 'string') {
    return { errorMessage: resp };
  }
  const code = typeof resp.code === 'string' ? resp.code : undefined;
  const errorCode = typeof resp.errorCode === 'string' ? resp.errorCode : undefined;
  const explicitMsg = typeof resp.errorMessage === 'string' ? resp.errorMessage : undefined;

  let fallbackMsg: string | undefined;
  const msg = resp.message;
  if (Array.isArray(msg)) fallbackMsg = msg.join(', ');
  else if (typeof msg === 'string') fallbackMsg = msg;

  return { code, errorCode, errorMessage: explicitMsg, fallbackMsg };
}

/** 获取 GraphQL 字段路径 */
function getGqlPath(host: ArgumentsHost): string[] | undefined {
  const gqlHost = GqlArgumentsHost.create(host);
  const info = gqlHost.getInfo<GraphQLResolveInfo>();
  const field = info?.fieldName;
  return field ? [field] : undefined;
}

/** 根据 HttpException 构建 GraphQL 错误对象
 * - extensions.code：GraphQL 错误大类（默认由 HTTP 状态码映射；也可在异常响应体里传 code 覆盖）
 * - extensions.errorCode：业务细分错误码（来自异常响应体）
 * - extensions.errorMessage：业务错误描述（来自异常响应体）
 */
function buildGraphQLErrorFromHttpException(
  exception: HttpException,
  host: ArgumentsHost,
): GraphQLError {
  const status = exception.getStatus();
  const resp = toExceptionPayload(exception.getResponse());
  const { code, errorCode, errorMessage, fallbackMsg } = extractPayload(resp);
  const finalMessage =
    errorMessage ??
    fallbackMsg ??
    (typeof exception.message === 'string' ? exception.message : 'Request failed');

  return new GraphQLError(finalMessage, {
    path: getGqlPath(host),
    extensions: {
      code: code ?? mapHttpToGqlCode(status),
      httpStatus: status,
      ...(errorCode ? { errorCode } : {}),
      ...(errorMessage ? { errorMessage } : {}),
    },
  });
}

/** 从未知异常构建 GraphQL 错误 */
function buildGraphQLErrorFromUnknown(exception: unknown, host: ArgumentsHost): GraphQLError {
  const msg = exception instanceof Error ? exception.message : 'Internal server error';

  return new GraphQLError(msg, {
    path: getGqlPath(host),
    extensions: {
      code: 'INTERNAL_SERVER_ERROR',
      httpStatus: 500,
      errorCode: 'INTERNAL_ERROR',
    },
  });
}

/** 将 DomainError 错误码映射为 GraphQL 错误类别 */
function mapDomainErrorToGqlCode(errorCode: string): string {
  // 错误码到 GraphQL 错误类别的映射表
  const errorCodeMap: Record<string, string> = {
    // 表格视图相关错误
    [TABLE_VIEW_ERROR.SORT_FIELD_NOT_ALLOWED]: 'BAD_USER_INPUT',
    [TABLE_VIEW_ERROR.INVALID_CONFIG]: 'INTERNAL_SERVER_ERROR',
    [TABLE_VIEW_ERROR.DB_QUERY_FAILED]: 'INTERNAL_SERVER_ERROR',

    // 导出相关错误
    [EXPORT_ERROR.FORMAT_NOT_SUPPORTED]: 'BAD_USER_INPUT',
    [EXPORT_ERROR.EXPORTER_NOT_CONFIGURED]: 'INTERNAL_SERVER_ERROR',
    [EXPORT_ERROR.EXPORT_FAILED]: 'INTERNAL_SERVER_ERROR',
  };

  // 返回映射结果，如果没有找到则返回默认值
  return errorCodeMap[errorCode] || 'BAD_USER_INPUT';
}

/** 从 DomainError 构建 GraphQL 错误对象 */
function buildGraphQLErrorFromDomainError(
  exception: DomainError,
  host: ArgumentsHost,
): GraphQLError {
  return new GraphQLError(exception.message, {
    path: getGqlPath(host),
    extensions: {
      code: mapDomainErrorToGqlCode(exception.code),
      errorCode: exception.code,
      errorMessage: exception.message,
      ...(exception.details ? { details: exception.details } : {}),
    },
  });
}

/** GraphQL 全局异常过滤器 */
@Catch()
export class GqlAllExceptionsFilter extends BaseExceptionFilter {
  override catch(exception: unknown, host: ArgumentsHost): GraphQLError | undefined {
    // HTTP 请求仍用默认处理；其余（GraphQL/RPC/WS）走下方分支
    if (host.getType() === 'http') {
      super.catch(exception, host);
      return undefined;
    }

    // 专门处理 DomainError
    if (isDomainError(exception)) {
      return buildGraphQLErrorFromDomainError(exception, host);
    }

    if (exception instanceof HttpException) {
      return buildGraphQLErrorFromHttpException(exception, host);
    }

    return buildGraphQLErrorFromUnknown(exception, host);
  }
}
