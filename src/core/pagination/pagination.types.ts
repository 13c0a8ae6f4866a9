// src/core/pagination/pagination.types.ts
// 纯类型与值对象，零依赖、零副作用

import type { PaginationMetadata } from '@core/table-view/table-view.types';

export interface OffsetParams {
  readonly page: number;
  readonly pageSize: number;
}

export interface PaginatedResult<T> {
  readonly items: ReadonlyArray<T>;
  readonly metadata: PaginationMetadata;
}
