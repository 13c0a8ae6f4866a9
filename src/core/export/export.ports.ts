// src/core/export/export.ports.ts
// 端口接口：ITableExporter，零依赖抽象
// 具体文件格式的生成由宿主应用提供实现

import type { ExportPayload, ExportRequest } from './export.types';

export interface ITableExporter {
  export<T>(request: ExportRequest<T>): Promise<ExportPayload>;
}
