// src/core/search/search.types.ts
// 纯类型定义：快速搜索选项，零依赖、零副作用

/**
 * 文本搜索选项
 * - searchColumns：参与模糊匹配的安全列名（含别名）
 * - exactColumns：以文本形式做等值匹配的安全列名（如主键）
 * - minQueryLength：去除前后空格后的最小长度，低于该值不应用搜索，默认 1
 * - searchMode：'OR' 任一列命中即可，'AND' 所有列都需命中，默认 'OR'
 */
export interface TextSearchOptions {
  readonly searchColumns: ReadonlyArray<string>;
  readonly exactColumns?: ReadonlyArray<string>;
  readonly minQueryLength?: number;
  readonly searchMode?: 'OR' | 'AND';
}

/**
 * 单个搜索子句（与驱动无关）
 */
export interface SearchClause {
  readonly clause: string;
  readonly params: Readonly<Record<string, unknown>>;
}
