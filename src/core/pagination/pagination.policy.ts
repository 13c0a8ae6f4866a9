// src/core/pagination/pagination.policy.ts
// 分页规则与纯函数：上限、默认值、元数据计算

import {
  TABLE_PARAM_KEYS,
  type PaginationMetadata,
  type ParameterMap,
  type TableViewConfig,
} from '@core/table-view/table-view.types';
import type { OffsetParams } from './pagination.types';

export const DEFAULT_MAX_PAGE_SIZE = 100;

function parsePositiveInt(raw: unknown): number | undefined {
  if (typeof raw !== 'string' || !/^\d+$/.test(raw.trim())) return undefined;
  const parsed = parseInt(raw, 10);
  return Number.isSafeInteger(parsed) && parsed >= 1 ? parsed : undefined;
}

export function enforceMaxPageSize(params: OffsetParams, max: number): OffsetParams {
  if (max <= 0) return params;
  const pageSize = Math.min(Math.max(params.pageSize, 1), max);
  const page = Math.max(params.page, 1);
  return { page, pageSize };
}

/**
 * 从参数映射读取 page / page_size
 * 非数字、小于 1 或超出安全整数时回退到 1 / defaultPageSize，页大小受上限约束
 */
export function resolveOffsetParams(
  params: ParameterMap,
  config: Pick<TableViewConfig, 'defaultPageSize'>,
  maxPageSize: number = DEFAULT_MAX_PAGE_SIZE,
): OffsetParams {
  const page = parsePositiveInt(params[TABLE_PARAM_KEYS.PAGE]) ?? 1;
  const pageSize =
    parsePositiveInt(params[TABLE_PARAM_KEYS.PAGE_SIZE]) ?? config.defaultPageSize;
  return enforceMaxPageSize({ page, pageSize }, maxPageSize);
}

/**
 * 空结果集的分页元数据：第 1 页、缺省页大小、0 条、0 页
 */
export function emptyPaginationMetadata(
  config: Pick<TableViewConfig, 'defaultPageSize'>,
): PaginationMetadata {
  return { pageNumber: 1, pageSize: config.defaultPageSize, totalEntries: 0, totalPages: 0 };
}

/**
 * 由页码、页大小与总数计算分页元数据
 */
export function toPaginationMetadata(input: {
  readonly page: number;
  readonly pageSize: number;
  readonly total: number;
}): PaginationMetadata {
  const pageSize = Math.max(input.pageSize, 1);
  const totalEntries = Math.max(input.total, 0);
  return {
    pageNumber: Math.max(input.page, 1),
    pageSize,
    totalEntries,
    totalPages: Math.ceil(totalEntries / pageSize),
  };
}
