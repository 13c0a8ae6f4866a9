// src/core/table-view/search-term.policy.ts
// 快速搜索词：从 filter.isearch 读取与写回

import { TABLE_PARAM_KEYS, type ParamValue, type ParameterMap } from './table-view.types';

/**
 * 提取搜索词，缺失时返回空字符串
 * 返回值来自 URL，属于不可信文本，只能以参数化方式进入查询
 */
export function extractSearchTerm(params: ParameterMap): string {
  const filter = params[TABLE_PARAM_KEYS.FILTER];
  if (filter === undefined || typeof filter === 'string') return '';
  const term = filter[TABLE_PARAM_KEYS.SEARCH];
  return typeof term === 'string' ? term : '';
}

/**
 * 提交搜索词后的参数映射
 * - 写入 filter.isearch，保留 filter 下的其他键
 * - 移除 page，新的搜索从第一页开始
 * - 空搜索词移除 isearch；filter 为空时一并移除
 */
export function withSearchTerm(params: ParameterMap, term: string): ParameterMap {
  const { [TABLE_PARAM_KEYS.PAGE]: _page, [TABLE_PARAM_KEYS.FILTER]: filter, ...rest } = params;

  const baseFilter: Record<string, ParamValue> =
    filter === undefined || typeof filter === 'string' ? {} : { ...filter };

  if (term) {
    baseFilter[TABLE_PARAM_KEYS.SEARCH] = term;
  } else {
    delete baseFilter[TABLE_PARAM_KEYS.SEARCH];
  }

  if (Object.keys(baseFilter).length === 0) return rest;
  return { ...rest, [TABLE_PARAM_KEYS.FILTER]: baseFilter };
}
