// src/core/config/table-view.config.ts
// 表格视图引擎配置：页码窗口半宽、默认排序字段、默认与最大页大小

import { ConfigFactory } from '@nestjs/config';

const readInt = (raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim() === '') return fallback;
  return parseInt(raw, 10);
};

const tableViewConfig: ConfigFactory = () => ({
  tableView: {
    distance: readInt(process.env.TABLE_VIEW_DISTANCE, 5),
    defaultSortField: process.env.TABLE_VIEW_DEFAULT_SORT_FIELD || 'id',
    defaultPageSize: readInt(process.env.TABLE_VIEW_DEFAULT_PAGE_SIZE, 10),
    maxPageSize: readInt(process.env.TABLE_VIEW_MAX_PAGE_SIZE, 100),
  },
});

export default tableViewConfig;
