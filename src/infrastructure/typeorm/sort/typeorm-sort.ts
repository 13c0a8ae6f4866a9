// src/infrastructure/typeorm/sort/typeorm-sort.ts
import { DomainError, TABLE_VIEW_ERROR } from '@core/common/errors/domain-error';
import type {
  ColumnOrdering,
  ISortFieldWhitelist,
  ISortResolver,
  OrderDirection,
  ValidatedSortState,
} from '@core/sort/sort.ports';
import type { ObjectLiteral, SelectQueryBuilder } from 'typeorm';

/**
 * TypeORM 排序解析器
 * - 提供白名单校验与业务字段到安全列名的映射
 * - 可选追加稳定副键（通常为主键），保证翻页时顺序确定
 * - 字段无法解析时直接抛出，禁止回退到原始列名
 */
export class TypeOrmSort<F extends string> implements ISortResolver<F> {
  /**
   * @param whitelist 允许的业务排序字段白名单
   * @param map 业务字段到安全物理列（含别名）的映射
   * @param tieBreaker 稳定副键列（含别名），与主排序列相同时不追加
   */
  constructor(
    private readonly whitelist: ISortFieldWhitelist<F>,
    private readonly map: Readonly<Record<F, string>>,
    private readonly tieBreaker?: string,
  ) {}

  resolveColumn(field: string): string | null {
    if (!this.whitelist.has(field)) return null;
    return this.map[field] ?? null;
  }

  orderings(sort: ValidatedSortState<F>): ReadonlyArray<ColumnOrdering> {
    const column = this.resolveColumn(sort.field);
    if (!column) {
      throw new DomainError(
        TABLE_VIEW_ERROR.SORT_FIELD_NOT_ALLOWED,
        // 白名单与解析必须同为"业务字段"语义
        `排序字段解析失败（白名单与列解析不一致）：${sort.field}`,
        { field: sort.field },
      );
    }
    const direction: OrderDirection = sort.direction === 'desc' ? 'DESC' : 'ASC';
    const result: ColumnOrdering[] = [{ column, direction }];
    if (this.tieBreaker && this.tieBreaker !== column) {
      result.push({ column: this.tieBreaker, direction });
    }
    return result;
  }

  /**
   * 将排序应用到 QueryBuilder（覆盖已有的 ORDER BY）
   */
  apply<T extends ObjectLiteral>(qb: SelectQueryBuilder<T>, sort: ValidatedSortState<F>): void {
    this.orderings(sort).forEach((o, idx) => {
      if (idx === 0) qb.orderBy(o.column, o.direction);
      else qb.addOrderBy(o.column, o.direction);
    });
  }
}
