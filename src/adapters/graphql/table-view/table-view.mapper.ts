// src/adapters/graphql/table-view/table-view.mapper.ts
// 引擎视图模型 → GraphQL DTO

import type { ExportPayload } from '@core/export/export.types';
import type { TableViewModel } from '@core/table-view/table-view.types';
import type { TableExportResult, TableViewDTO } from './dto/table-view.dto';

export function mapTableViewToDTO(view: TableViewModel): TableViewDTO {
  const { pagination } = view;
  return {
    sort: { ...view.sort },
    searchTerm: view.searchTerm,
    query: view.query,
    headers: view.headers.map((header) => ({ ...header })),
    pagination: {
      metadata: { ...pagination.metadata },
      previous: pagination.previous,
      next: pagination.next,
      pages: pagination.pages.map((link) => ({ ...link })),
      summary: { ...pagination.summary },
    },
  };
}

export function mapExportPayloadToDTO(payload: ExportPayload): TableExportResult {
  return {
    filename: payload.filename,
    contentType: payload.contentType,
    contentBase64: payload.content.toString('base64'),
  };
}
