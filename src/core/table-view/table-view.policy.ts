// src/core/table-view/table-view.policy.ts
// 引擎入口：配置归一化与一次渲染所需视图状态的组装

import { DomainError, TABLE_VIEW_ERROR } from '@core/common/errors/domain-error';
import { pageLinks } from './page-window.policy';
import { buildQueryString } from './query-string';
import { extractSearchTerm } from './search-term.policy';
import { resolveSort, sortHeaders } from './sort-state.policy';
import {
  DEFAULT_TABLE_VIEW_CONFIG,
  type PaginationMetadata,
  type ParameterMap,
  type TableColumn,
  type TableViewConfig,
  type TableViewModel,
} from './table-view.types';

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 1;
}

/**
 * 合并并校验引擎配置
 * @param partial 调用方提供的部分配置，未提供的项使用默认值
 * @throws DomainError(TABLE_VIEW_ERROR.INVALID_CONFIG)
 */
export function resolveTableViewConfig(partial: Partial<TableViewConfig> = {}): TableViewConfig {
  const config: TableViewConfig = {
    distance: partial.distance ?? DEFAULT_TABLE_VIEW_CONFIG.distance,
    defaultSortField: partial.defaultSortField ?? DEFAULT_TABLE_VIEW_CONFIG.defaultSortField,
    defaultPageSize: partial.defaultPageSize ?? DEFAULT_TABLE_VIEW_CONFIG.defaultPageSize,
  };

  if (!isPositiveInteger(config.distance)) {
    throw new DomainError(TABLE_VIEW_ERROR.INVALID_CONFIG, 'distance 必须为正整数', {
      distance: config.distance,
    });
  }
  if (!isPositiveInteger(config.defaultPageSize)) {
    throw new DomainError(TABLE_VIEW_ERROR.INVALID_CONFIG, 'defaultPageSize 必须为正整数', {
      defaultPageSize: config.defaultPageSize,
    });
  }
  if (!config.defaultSortField.trim()) {
    throw new DomainError(TABLE_VIEW_ERROR.INVALID_CONFIG, 'defaultSortField 不能为空');
  }
  return config;
}

/**
 * 组装表格视图模型
 * 排序状态只做解析；调用方在查询数据前应已完成白名单校验
 */
export function buildTableView(input: {
  readonly params: ParameterMap;
  readonly metadata: PaginationMetadata;
  readonly columns: ReadonlyArray<TableColumn>;
  readonly config: TableViewConfig;
}): TableViewModel {
  const { params, metadata, columns, config } = input;
  return {
    sort: resolveSort(params, config.defaultSortField),
    searchTerm: extractSearchTerm(params),
    query: buildQueryString(params),
    headers: sortHeaders(params, columns, config.defaultSortField),
    pagination: pageLinks(params, metadata, config.distance),
  };
}
