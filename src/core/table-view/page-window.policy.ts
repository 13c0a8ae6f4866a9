// src/core/table-view/page-window.policy.ts
// 分页窗口与分页链接：根据当前页与总页数计算需要展示的页码

import { buildQueryString } from './query-string';
import {
  DEFAULT_TABLE_VIEW_CONFIG,
  TABLE_PARAM_KEYS,
  type PageLink,
  type PageWindow,
  type PaginationMetadata,
  type PaginationSummary,
  type PaginationView,
  type ParameterMap,
} from './table-view.types';

export function startPage(currentPage: number, distance: number): number {
  return Math.max(1, currentPage - distance);
}

/**
 * 计算窗口终点
 * 居中分支为 currentPage + distance - 1，比靠近末尾的分支窄一页；保持现有行为
 */
export function endPage(currentPage: number, totalPages: number, distance: number): number {
  if (totalPages === 0) return currentPage;
  if (currentPage <= distance && distance * 2 <= totalPages) return distance * 2;
  if (currentPage + distance >= totalPages) return totalPages;
  return currentPage + distance - 1;
}

/**
 * 计算页码窗口
 * @param currentPage 当前页（从 1 开始）
 * @param totalPages 总页数；为 0 时仍返回当前页
 * @param distance 窗口半宽
 */
export function pageWindow(
  currentPage: number,
  totalPages: number,
  distance: number = DEFAULT_TABLE_VIEW_CONFIG.distance,
): PageWindow {
  if (totalPages === 0) return [currentPage];
  const start = startPage(currentPage, distance);
  const end = endPage(currentPage, totalPages, distance);
  const pages: number[] = [];
  for (let page = start; page <= end; page += 1) {
    pages.push(page);
  }
  return pages;
}

/**
 * "Showing {from} to {to} of {total}" 摘要
 */
export function paginationSummary(metadata: PaginationMetadata): PaginationSummary {
  const { pageNumber, pageSize, totalEntries } = metadata;
  const from = totalEntries === 0 ? 0 : (pageNumber - 1) * pageSize + 1;
  const to = Math.min(pageNumber * pageSize, totalEntries);
  return { from, to, total: totalEntries };
}

function pageQuery(params: ParameterMap, page: number): string {
  return buildQueryString(params, { [TABLE_PARAM_KEYS.PAGE]: String(page) });
}

/**
 * 生成分页视图：上一页 / 下一页 / 页码列表 / 摘要
 * 只有一页（或没有数据）时不生成页码列表
 */
export function pageLinks(
  params: ParameterMap,
  metadata: PaginationMetadata,
  distance: number = DEFAULT_TABLE_VIEW_CONFIG.distance,
): PaginationView {
  const { pageNumber, totalPages } = metadata;

  const previous = pageNumber !== 1 ? pageQuery(params, pageNumber - 1) : null;
  const next =
    pageNumber !== totalPages && totalPages > 0 ? pageQuery(params, pageNumber + 1) : null;

  const pages: PageLink[] =
    totalPages > 1
      ? pageWindow(pageNumber, totalPages, distance).map((page) => ({
          page,
          query: pageQuery(params, page),
          current: page === pageNumber,
        }))
      : [];

  return {
    metadata,
    previous,
    next,
    pages,
    summary: paginationSummary(metadata),
  };
}
