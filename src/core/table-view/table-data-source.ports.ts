// src/core/table-view/table-data-source.ports.ts
// 端口接口：表格数据源（排序 + 搜索 + 分页的执行方），零依赖抽象

import type { OffsetParams, PaginatedResult } from '@core/pagination/pagination.types';
import type { ValidatedSortState } from '@core/sort/sort.ports';

/**
 * 数据查询条件：已校验的排序与原始搜索词
 * 屏幕渲染与导出必须使用同一份条件
 */
export interface TableQuery<F extends string = string> {
  readonly sort: ValidatedSortState<F>;
  readonly searchTerm: string;
}

export interface TablePageQuery<F extends string = string> extends TableQuery<F> {
  readonly page: OffsetParams;
}

/**
 * 表格数据源端口
 * TBuilder 为具体驱动的查询构建器，TRow 为行类型
 */
export interface ITableDataSource<TBuilder, TRow, F extends string = string> {
  /** 当前页数据与分页元数据 */
  fetchPage(input: {
    readonly qb: TBuilder;
    readonly query: TablePageQuery<F>;
  }): Promise<PaginatedResult<TRow>>;

  /** 不分页的完整结果（导出使用），排序与搜索与 fetchPage 一致 */
  fetchAll(input: {
    readonly qb: TBuilder;
    readonly query: TableQuery<F>;
  }): Promise<ReadonlyArray<TRow>>;
}
