// src/infrastructure/typeorm/search/typeorm-search.ts
// ITextSearch 的 TypeORM 实现：把快速搜索词转换为参数化的 where 子句

import { buildContainsPattern, shouldApplySearch } from '@core/search/search.policy';
import type { ITextSearch } from '@core/search/search.ports';
import type { SearchClause, TextSearchOptions } from '@core/search/search.types';
import type { ObjectLiteral, SelectQueryBuilder } from 'typeorm';

/**
 * TypeORM 文本搜索
 * - 模糊列：LOWER(col) LIKE LOWER(:q)，通配符已转义（MySQL 默认以 \ 作为 LIKE 转义符）
 * - 精确列：CAST(col AS CHAR) = :qExact，用于主键等数字列
 * - 搜索词只作为命名参数传入
 */
export class TypeOrmTextSearch implements ITextSearch {
  buildClause(term: string, options: TextSearchOptions): SearchClause | null {
    const exactColumns = options.exactColumns ?? [];
    if (options.searchColumns.length === 0 && exactColumns.length === 0) return null;
    if (!shouldApplySearch(term, options.minQueryLength)) return null;

    const joiner = options.searchMode === 'AND' ? ' AND ' : ' OR ';
    const likeGroup = options.searchColumns
      .map((col) => `LOWER(${col}) LIKE LOWER(:q)`)
      .join(joiner);
    const exactClauses = exactColumns.map((col) => `CAST(${col} AS CHAR) = :qExact`);

    const normalized = term.trim();
    const parts = [...(likeGroup ? [`(${likeGroup})`] : []), ...exactClauses];
    const params: Record<string, unknown> = {};
    if (likeGroup) params.q = buildContainsPattern(normalized);
    if (exactClauses.length > 0) params.qExact = normalized;

    const clause = parts.length === 1 ? parts[0] : `(${parts.join(' OR ')})`;
    return { clause, params };
  }

  /**
   * 应用搜索到 QueryBuilder；搜索词为空或过短时不做任何修改
   */
  apply<T extends ObjectLiteral>(
    qb: SelectQueryBuilder<T>,
    term: string,
    options: TextSearchOptions,
  ): void {
    const built = this.buildClause(term, options);
    if (built) qb.andWhere(built.clause, built.params);
  }
}
