// src/core/table-view/sort-state.policy.ts
// 排序状态规则：从参数映射解析排序、表头点击后的排序切换

import { buildQueryString, mergeParams } from './query-string';
import {
  TABLE_PARAM_KEYS,
  type ParameterMap,
  type SortDirection,
  type SortHeader,
  type SortState,
  type TableColumn,
} from './table-view.types';

function readString(params: ParameterMap, key: string): string | undefined {
  const value = params[key];
  return typeof value === 'string' ? value : undefined;
}

export function isSortDirection(value: unknown): value is SortDirection {
  return value === 'asc' || value === 'desc';
}

/**
 * 解析排序状态
 * 仅当 sort_direction 恰为 asc / desc 且 sort_field 为非空字符串时采用参数值，
 * 否则回退为 (asc, defaultField)。
 * 注意：此处只做解析，不校验字段是否存在；用于构建查询前必须经过白名单校验。
 */
export function resolveSort(params: ParameterMap, defaultField: string): SortState {
  const direction = readString(params, TABLE_PARAM_KEYS.SORT_DIRECTION);
  const field = readString(params, TABLE_PARAM_KEYS.SORT_FIELD);
  if (isSortDirection(direction) && field) {
    return { direction, field };
  }
  return { direction: 'asc', field: defaultField };
}

/**
 * 翻转排序方向：asc → desc，其余（含缺失与非法值）→ asc
 */
export function reverseDirection(direction: string | undefined): SortDirection {
  return direction === 'asc' ? 'desc' : 'asc';
}

/**
 * 计算点击某列表头后的参数映射
 * - 当前排序字段（原始字符串比较）与目标相同：翻转方向（严格二态切换）
 * - 否则：切换到目标字段，方向为 desc
 * 其他键（包括 page）原样保留
 */
export function nextSortParams(params: ParameterMap, targetField: string): ParameterMap {
  const currentField = readString(params, TABLE_PARAM_KEYS.SORT_FIELD);
  const direction: SortDirection =
    currentField === targetField
      ? reverseDirection(readString(params, TABLE_PARAM_KEYS.SORT_DIRECTION))
      : 'desc';

  return mergeParams(params, {
    [TABLE_PARAM_KEYS.SORT_FIELD]: targetField,
    [TABLE_PARAM_KEYS.SORT_DIRECTION]: direction,
  });
}

/**
 * 生成表头视图：激活状态、当前方向与点击后的查询串
 */
export function sortHeaders(
  params: ParameterMap,
  columns: ReadonlyArray<TableColumn>,
  defaultField: string,
): ReadonlyArray<SortHeader> {
  const current = resolveSort(params, defaultField);
  return columns.map((column) => {
    const sortable = column.sortable ?? true;
    const active = current.field === column.field;
    return {
      field: column.field,
      label: column.label,
      sortable,
      active,
      direction: active ? current.direction : null,
      query: sortable ? buildQueryString(nextSortParams(params, column.field)) : null,
    };
  });
}
