// src/types/errors/exception-payload.ts

/**
 * HttpException 的响应体约定
 * 全局过滤器从这里读取 GraphQL extensions
 */
export interface ExceptionPayload {
  /** GraphQL 错误大类，缺省由 HTTP 状态码推导 */
  code?: string;
  /** 业务错误码，如 INPUT_VALIDATION_FAILED */
  errorCode?: string;
  errorMessage?: string;
  /** Nest 内置异常的 message 可能是数组 */
  message?: string | string[];
  [key: string]: unknown;
}
