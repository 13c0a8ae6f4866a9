// src/infrastructure/typeorm/pagination/typeorm-paginator.ts
// Offset 分页的 TypeORM 实现，输出表格所需的分页元数据

import { DomainError, TABLE_VIEW_ERROR } from '@core/common/errors/domain-error';
import { toPaginationMetadata } from '@core/pagination/pagination.policy';
import type { OffsetParams, PaginatedResult } from '@core/pagination/pagination.types';
import type { ObjectLiteral, SelectQueryBuilder } from 'typeorm';

export class TypeOrmTablePaginator {
  /**
   * 执行 Offset 分页
   * - 先计数再取数，数据查询与计数查询均在克隆上进行，不污染调用方的 builder
   * - 空结果集统一为第 1 页、0 页
   * - 页码超出末页时回到最后一页
   */
  async paginate<T extends ObjectLiteral>(
    qb: SelectQueryBuilder<T>,
    params: OffsetParams,
  ): Promise<PaginatedResult<T>> {
    try {
      const countQb = qb.clone();
      // 清理排序以提升 COUNT 性能，避免 ORDER BY 对 COUNT 的影响
      countQb.orderBy();
      const total = await countQb.getCount();

      if (total === 0) {
        return {
          items: [],
          metadata: toPaginationMetadata({ page: 1, pageSize: params.pageSize, total: 0 }),
        };
      }

      const lastPage = Math.ceil(total / params.pageSize);
      const page = Math.min(params.page, lastPage);
      const items = await qb
        .clone()
        .skip((page - 1) * params.pageSize)
        .take(params.pageSize)
        .getMany();

      return {
        items,
        metadata: toPaginationMetadata({ page, pageSize: params.pageSize, total }),
      };
    } catch (error) {
      if (error instanceof DomainError) throw error;
      throw new DomainError(
        TABLE_VIEW_ERROR.DB_QUERY_FAILED,
        '分页查询失败',
        { error: error instanceof Error ? error.message : '未知错误' },
        error,
      );
    }
  }
}
