// src/core/table-view/query-string.ts
// 参数映射与查询串之间的往返：规范化序列化（键按字典序）与容错解析

import type { ParamOverrides, ParamValue, ParameterMap } from './table-view.types';

// 解析时拒绝的键段：对普通对象赋值会改写原型
const PROTO_KEY = '__proto__';

type MutableParameterMap = { [key: string]: ParamValue };

/**
 * 合并覆盖值
 * - undefined：未提供覆盖，保留原值
 * - null：删除该键
 * - 其他：覆盖原值
 */
export function mergeParams(params: ParameterMap, overrides: ParamOverrides = {}): ParameterMap {
  const merged: MutableParameterMap = { ...params };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    if (value === null) {
      delete merged[key];
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * 将嵌套参数展开为方括号键，例如 { filter: { isearch: 'a' } } → { 'filter[isearch]': 'a' }
 */
export function flattenParams(params: ParameterMap, prefix?: string): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    const flatKey = prefix === undefined ? key : `${prefix}[${key}]`;
    if (typeof value === 'string') {
      flat[flatKey] = value;
    } else {
      Object.assign(flat, flattenParams(value, flatKey));
    }
  }
  return flat;
}

/**
 * 构建规范查询串
 * 所有状态迁移（分页链接、排序链接、搜索提交）都经由此函数生成新的 URL。
 * @param params 当前参数映射
 * @param overrides 覆盖值（覆盖优先；null 表示删除）
 * @returns 百分号编码、键按字典序排列的查询串（不含前导 ?）
 */
export function buildQueryString(params: ParameterMap, overrides: ParamOverrides = {}): string {
  const flat = flattenParams(mergeParams(params, overrides));
  return Object.keys(flat)
    .sort()
    .map((key) => `${encodeURIComponent(key)}=${encodeURIComponent(flat[key])}`)
    .join('&');
}

function decodeComponent(raw: string): string {
  const spaced = raw.replace(/\+/g, ' ');
  try {
    return decodeURIComponent(spaced);
  } catch {
    // 非法百分号序列按原文保留
    return spaced;
  }
}

/**
 * 拆分方括号键：'filter[isearch]' → ['filter', 'isearch']
 * 格式不合法（含空段或未闭合）时整体作为普通键
 */
function splitKey(key: string): ReadonlyArray<string> {
  const match = /^([^[\]]+)((?:\[[^[\]]+\])*)$/.exec(key);
  if (!match || !match[2]) return [key];
  const segments = match[2].slice(1, -1).split('][');
  return [match[1], ...segments];
}

function assignPath(target: MutableParameterMap, path: ReadonlyArray<string>, value: string): void {
  if (path.includes(PROTO_KEY)) return;

  let cursor = target;
  path.slice(0, -1).forEach((segment) => {
    // 只读自有属性，constructor 等键不能取到原型上的值
    const existing = Object.hasOwn(cursor, segment) ? cursor[segment] : undefined;
    // 后出现的嵌套键覆盖同名的字符串值
    const nested: MutableParameterMap =
      existing === undefined || typeof existing === 'string' ? {} : { ...existing };
    cursor[segment] = nested;
    cursor = nested;
  });
  cursor[path[path.length - 1]] = value;
}

/**
 * 解析查询串为参数映射
 * - 容忍前导 ?，+ 视为空格
 * - 方括号键还原为嵌套映射
 * - 同名键后者覆盖前者
 * - __proto__ 键段被丢弃；constructor、prototype 等键按普通键保留
 *
 * 注意：参数映射的键本身不应包含方括号；{ 'a[b]': 'v' } 序列化后会解析为 { a: { b: 'v' } }
 */
export function parseQueryString(query: string): ParameterMap {
  const result: MutableParameterMap = {};
  const body = query.startsWith('?') ? query.slice(1) : query;

  body.split('&').forEach((pair) => {
    if (!pair) return;
    const eq = pair.indexOf('=');
    const rawKey = eq === -1 ? pair : pair.slice(0, eq);
    const rawValue = eq === -1 ? '' : pair.slice(eq + 1);
    const key = decodeComponent(rawKey);
    if (!key) return;
    assignPath(result, splitKey(key), decodeComponent(rawValue));
  });

  return result;
}
