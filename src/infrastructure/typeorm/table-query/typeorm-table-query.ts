// src/infrastructure/typeorm/table-query/typeorm-table-query.ts
// ITableDataSource 的 TypeORM 实现：组合搜索、排序与分页

import { DomainError, TABLE_VIEW_ERROR } from '@core/common/errors/domain-error';
import type { PaginatedResult } from '@core/pagination/pagination.types';
import type { TextSearchOptions } from '@core/search/search.types';
import type {
  ITableDataSource,
  TablePageQuery,
  TableQuery,
} from '@core/table-view/table-data-source.ports';
import type { ObjectLiteral, SelectQueryBuilder } from 'typeorm';
import type { TypeOrmTablePaginator } from '../pagination/typeorm-paginator';
import type { TypeOrmTextSearch } from '../search/typeorm-search';
import type { TypeOrmSort } from '../sort/typeorm-sort';

export interface TypeOrmTableQueryDeps<F extends string> {
  readonly sort: TypeOrmSort<F>;
  readonly search: TypeOrmTextSearch;
  readonly searchOptions: TextSearchOptions;
  readonly paginator: TypeOrmTablePaginator;
}

/**
 * TypeORM 表格数据源
 * - 进入时克隆调用方的 QueryBuilder，避免 where/orderBy 副作用污染调用方
 * - fetchPage 与 fetchAll 共用同一套搜索与排序，保证导出与屏幕顺序一致
 */
export class TypeOrmTableQuery<T extends ObjectLiteral, F extends string>
  implements ITableDataSource<SelectQueryBuilder<T>, T, F>
{
  constructor(private readonly deps: TypeOrmTableQueryDeps<F>) {}

  async fetchPage(input: {
    readonly qb: SelectQueryBuilder<T>;
    readonly query: TablePageQuery<F>;
  }): Promise<PaginatedResult<T>> {
    const qb = this.prepare(input.qb, input.query);
    return this.deps.paginator.paginate(qb, input.query.page);
  }

  async fetchAll(input: {
    readonly qb: SelectQueryBuilder<T>;
    readonly query: TableQuery<F>;
  }): Promise<ReadonlyArray<T>> {
    const qb = this.prepare(input.qb, input.query);
    try {
      return await qb.getMany();
    } catch (error) {
      throw new DomainError(
        TABLE_VIEW_ERROR.DB_QUERY_FAILED,
        '导出查询失败',
        { error: error instanceof Error ? error.message : '未知错误' },
        error,
      );
    }
  }

  private prepare(source: SelectQueryBuilder<T>, query: TableQuery<F>): SelectQueryBuilder<T> {
    const qb = source.clone();
    this.deps.search.apply(qb, query.searchTerm, this.deps.searchOptions);
    this.deps.sort.apply(qb, query.sort);
    return qb;
  }
}
