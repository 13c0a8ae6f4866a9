// src/core/sort/sort-field.whitelist.ts
// 排序字段白名单：显式的允许字段集合，非法字段走独立的错误路径

import { DomainError, TABLE_VIEW_ERROR } from '@core/common/errors/domain-error';
import { resolveSort } from '@core/table-view/sort-state.policy';
import type { ParameterMap } from '@core/table-view/table-view.types';
import type { ISortFieldWhitelist, ValidatedSortState } from './sort.ports';

/**
 * 创建排序字段白名单
 * @param fields 允许的业务排序字段
 */
export function createSortFieldWhitelist<F extends string>(
  fields: ReadonlyArray<F>,
): ISortFieldWhitelist<F> {
  const allowed: ReadonlySet<string> = new Set<string>(fields);

  const has = (field: string): field is F => allowed.has(field);

  return {
    fields,
    has,
    assert(field: string): F {
      if (has(field)) return field;
      throw new DomainError(TABLE_VIEW_ERROR.SORT_FIELD_NOT_ALLOWED, `非法排序字段: ${field}`, {
        field,
        allowed: fields,
      });
    },
  };
}

/**
 * 解析并校验排序状态
 * 非法方向静默回退到默认排序；非法字段直接抛出，不做任何回退
 * @param params 参数映射
 * @param whitelist 排序字段白名单
 * @param defaultField 默认排序字段（同样需在白名单内）
 */
export function resolveValidatedSort<F extends string>(
  params: ParameterMap,
  whitelist: ISortFieldWhitelist<F>,
  defaultField: F,
): ValidatedSortState<F> {
  const sort = resolveSort(params, defaultField);
  return { direction: sort.direction, field: whitelist.assert(sort.field) };
}
