// src/core/sort/sort.ports.ts
import type { SortState } from '@core/table-view/table-view.types';

/**
 * 排序字段白名单端口
 * 排序字段来自 URL 参数（不可信输入），进入任何查询前必须经过白名单校验。
 * 注意：此端口仅包含纯类型与规则，不依赖任何框架或驱动。
 */
export interface ISortFieldWhitelist<F extends string = string> {
  readonly fields: ReadonlyArray<F>;

  /** 字段是否在白名单内 */
  has(field: string): field is F;

  /**
   * 校验字段并返回收窄后的类型，非法字段抛出 SORT_FIELD_NOT_ALLOWED
   */
  assert(field: string): F;
}

/**
 * 已校验的排序状态（字段已收窄为白名单成员）
 */
export interface ValidatedSortState<F extends string = string> extends SortState {
  readonly field: F;
}

export type OrderDirection = 'ASC' | 'DESC';

export interface ColumnOrdering {
  readonly column: string;
  readonly direction: OrderDirection;
}

/**
 * 排序解析端口
 * 负责将业务排序字段解析为安全的列名（由基础设施层实现）
 */
export interface ISortResolver<F extends string = string> {
  /**
   * 解析排序字段为安全列名（带别名），非法字段返回 null
   * @param field 业务排序字段
   */
  resolveColumn(field: string): string | null;

  /**
   * 生成 ORDER BY 列表（含可选的稳定副键）；字段无法解析时抛出而非回退
   */
  orderings(sort: ValidatedSortState<F>): ReadonlyArray<ColumnOrdering>;
}
