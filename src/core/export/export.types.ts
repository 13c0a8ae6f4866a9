// src/core/export/export.types.ts
// 纯类型定义：导出格式与导出结果

import type { TableColumn } from '@core/table-view/table-view.types';

export const EXPORT_FORMATS = ['csv', 'xlsx', 'pdf'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

/**
 * 导出结果：字节内容、MIME 类型与文件名
 */
export interface ExportPayload {
  readonly content: Buffer;
  readonly contentType: string;
  readonly filename: string;
}

/**
 * 交给导出器的请求
 * rows 为完整（不分页）的、已按当前排序与搜索处理过的结果集
 */
export interface ExportRequest<T> {
  readonly format: ExportFormat;
  readonly columns: ReadonlyArray<TableColumn>;
  readonly rows: ReadonlyArray<T>;
  readonly filename: string;
  readonly contentType: string;
}
