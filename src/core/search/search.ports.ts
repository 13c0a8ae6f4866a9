// src/core/search/search.ports.ts
// 端口接口：ITextSearch，零依赖抽象

import type { SearchClause, TextSearchOptions } from './search.types';

/**
 * 文本搜索端口
 * - 把搜索词转换为参数化的 where 子句（搜索词只进入参数，不拼接进 SQL）
 * - 在 core 层仅定义抽象，不引入任何外部驱动
 */
export interface ITextSearch {
  /**
   * @returns 搜索子句；搜索词为空或过短时返回 null
   */
  buildClause(term: string, options: TextSearchOptions): SearchClause | null;
}
