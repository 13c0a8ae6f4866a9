// src/core/search/search.policy.ts
// 搜索规则与纯函数：最小长度短路、LIKE 转义

/**
 * 是否应用文本搜索（避免 LIKE '%%' 退化为全表扫描）
 */
export function shouldApplySearch(term: string, minQueryLength: number = 1): boolean {
  return term.trim().length >= Math.max(minQueryLength, 1);
}

/**
 * 转义 LIKE 通配符（MySQL 默认以 \ 作为 LIKE 转义符）
 */
export function escapeLikePattern(term: string): string {
  return term.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
}

/**
 * 包含匹配的 LIKE 模式：%term%
 */
export function buildContainsPattern(term: string): string {
  return `%${escapeLikePattern(term)}%`;
}
