// src/modules/table-view/table-view.settings.ts

import { DomainError, TABLE_VIEW_ERROR } from '@core/common/errors/domain-error';
import { DEFAULT_MAX_PAGE_SIZE } from '@core/pagination/pagination.policy';
import { resolveTableViewConfig } from '@core/table-view/table-view.policy';
import type { TableViewConfig } from '@core/table-view/table-view.types';
import type { ConfigService } from '@nestjs/config';

/**
 * 运行期表格视图设置：引擎配置 + 页大小上限
 */
export interface TableViewSettings extends TableViewConfig {
  readonly maxPageSize: number;
}

/**
 * 从 ConfigService 读取 tableView 配置并校验
 * @throws DomainError(TABLE_VIEW_ERROR.INVALID_CONFIG)
 */
export function resolveTableViewSettings(config: ConfigService): TableViewSettings {
  const engine = resolveTableViewConfig({
    distance: config.get<number>('tableView.distance'),
    defaultSortField: config.get<string>('tableView.defaultSortField'),
    defaultPageSize: config.get<number>('tableView.defaultPageSize'),
  });
  const maxPageSize = config.get<number>('tableView.maxPageSize') ?? DEFAULT_MAX_PAGE_SIZE;
  if (!Number.isInteger(maxPageSize) || maxPageSize < engine.defaultPageSize) {
    throw new DomainError(
      TABLE_VIEW_ERROR.INVALID_CONFIG,
      'maxPageSize 必须为不小于 defaultPageSize 的整数',
      { maxPageSize, defaultPageSize: engine.defaultPageSize },
    );
  }
  return { ...engine, maxPageSize };
}
