// src/modules/table-view/table-view.service.ts

import { emptyPaginationMetadata, resolveOffsetParams } from '@core/pagination/pagination.policy';
import type { OffsetParams } from '@core/pagination/pagination.types';
import { resolveValidatedSort } from '@core/sort/sort-field.whitelist';
import type { ISortFieldWhitelist, ValidatedSortState } from '@core/sort/sort.ports';
import {
  buildTableView,
  extractSearchTerm,
  parseQueryString,
  resolveSort,
  withSearchTerm,
  type PaginationMetadata,
  type ParameterMap,
  type SortState,
  type TableColumn,
  type TableViewModel,
} from '@core/table-view';
import { Inject, Injectable } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import { TABLE_VIEW_TOKENS } from './table-view.tokens';
import type { TableViewSettings } from './table-view.settings';

/**
 * 表格视图服务
 * 把纯函数引擎绑定到运行期配置，供各个表格用例复用
 */
@Injectable()
export class TableViewService {
  constructor(
    @Inject(TABLE_VIEW_TOKENS.SETTINGS)
    readonly settings: TableViewSettings,
    @InjectPinoLogger('TableViewService')
    private readonly logger: PinoLogger,
  ) {}

  /**
   * 解析地址栏查询串为参数映射
   * @param query 原始查询串，可带前导 ?
   */
  parse(query?: string | null): ParameterMap {
    return parseQueryString(query ?? '');
  }

  resolveSort(params: ParameterMap): SortState {
    return resolveSort(params, this.settings.defaultSortField);
  }

  /**
   * 解析并按白名单校验排序；默认排序字段也必须在白名单内
   * @throws DomainError(TABLE_VIEW_ERROR.SORT_FIELD_NOT_ALLOWED)
   */
  resolveValidatedSort<F extends string>(
    params: ParameterMap,
    whitelist: ISortFieldWhitelist<F>,
  ): ValidatedSortState<F> {
    const defaultField = whitelist.assert(this.settings.defaultSortField);
    return resolveValidatedSort(params, whitelist, defaultField);
  }

  searchTerm(params: ParameterMap): string {
    return extractSearchTerm(params);
  }

  /** 提交新的搜索词（重置页码） */
  withSearchTerm(params: ParameterMap, term: string): ParameterMap {
    return withSearchTerm(params, term);
  }

  offsetParams(params: ParameterMap): OffsetParams {
    return resolveOffsetParams(params, this.settings, this.settings.maxPageSize);
  }

  emptyMetadata(): PaginationMetadata {
    return emptyPaginationMetadata(this.settings);
  }

  /**
   * 组装一次渲染所需的视图模型
   * 数据源返回 0 条时统一使用空结果元数据
   */
  buildView(input: {
    readonly params: ParameterMap;
    readonly metadata: PaginationMetadata;
    readonly columns: ReadonlyArray<TableColumn>;
  }): TableViewModel {
    const metadata = input.metadata.totalEntries === 0 ? this.emptyMetadata() : input.metadata;
    const view = buildTableView({
      params: input.params,
      metadata,
      columns: input.columns,
      config: this.settings,
    });
    this.logger.debug(
      {
        sort: view.sort,
        searchTerm: view.searchTerm,
        pageNumber: metadata.pageNumber,
        totalPages: metadata.totalPages,
      },
      '表格视图已生成',
    );
    return view;
  }
}
