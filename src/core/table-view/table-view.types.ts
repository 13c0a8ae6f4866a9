// src/core/table-view/table-view.types.ts
// 纯类型与值对象，零依赖、零副作用

/**
 * 参数值：叶子为字符串，允许一层嵌套（如 filter.isearch）
 */
export type ParamValue = string | ParameterMap;

/**
 * 参数映射
 * 表格的全部可观察状态（排序字段、排序方向、页码、搜索词）都保存在这里，
 * 与 URL 查询串一一往返；未识别的键原样透传（如 page_size）
 */
export interface ParameterMap {
  readonly [key: string]: ParamValue;
}

/**
 * 覆盖值：null / undefined 表示删除该键
 */
export type ParamOverrides = Readonly<Record<string, ParamValue | null | undefined>>;

export type SortDirection = 'asc' | 'desc';

export interface SortState {
  readonly direction: SortDirection;
  readonly field: string;
}

/**
 * 分页元数据，由数据源提供，引擎只读取
 */
export interface PaginationMetadata {
  readonly pageNumber: number;
  readonly pageSize: number;
  readonly totalEntries: number;
  readonly totalPages: number;
}

export type PageWindow = ReadonlyArray<number>;

/**
 * 引擎配置
 * - distance：页码窗口半宽
 * - defaultSortField：缺省排序字段（通常为主键）
 * - defaultPageSize：缺省每页数量
 */
export interface TableViewConfig {
  readonly distance: number;
  readonly defaultSortField: string;
  readonly defaultPageSize: number;
}

export const DEFAULT_TABLE_VIEW_CONFIG: TableViewConfig = Object.freeze({
  distance: 5,
  defaultSortField: 'id',
  defaultPageSize: 10,
});

// 引擎识别的参数键
export const TABLE_PARAM_KEYS = {
  SORT_FIELD: 'sort_field',
  SORT_DIRECTION: 'sort_direction',
  PAGE: 'page',
  PAGE_SIZE: 'page_size',
  FILTER: 'filter',
  SEARCH: 'isearch',
} as const;

/**
 * 列定义（供表头排序链接使用）
 */
export interface TableColumn {
  readonly field: string;
  readonly label: string;
  readonly sortable?: boolean;
}

export interface SortHeader {
  readonly field: string;
  readonly label: string;
  readonly sortable: boolean;
  readonly active: boolean;
  readonly direction: SortDirection | null;
  /** 点击表头后的新查询串；不可排序的列为 null */
  readonly query: string | null;
}

export interface PageLink {
  readonly page: number;
  readonly query: string;
  readonly current: boolean;
}

export interface PaginationSummary {
  readonly from: number;
  readonly to: number;
  readonly total: number;
}

export interface PaginationView {
  readonly metadata: PaginationMetadata;
  readonly previous: string | null;
  readonly next: string | null;
  readonly pages: ReadonlyArray<PageLink>;
  readonly summary: PaginationSummary;
}

/**
 * 一次渲染所需的全部视图状态
 */
export interface TableViewModel {
  readonly sort: SortState;
  readonly searchTerm: string;
  /** 当前状态的规范查询串 */
  readonly query: string;
  readonly headers: ReadonlyArray<SortHeader>;
  readonly pagination: PaginationView;
}
