// src/modules/members/members-table.definition.ts
// 成员表格的列、排序白名单与搜索列定义

import { createSortFieldWhitelist } from '@core/sort/sort-field.whitelist';
import type { TextSearchOptions } from '@core/search/search.types';
import type { TableColumn } from '@core/table-view/table-view.types';

export const MEMBERS_TABLE_ALIAS = 'member';

export const MEMBER_SORT_FIELDS = ['id', 'name', 'email', 'createdAt'] as const;

export type MemberSortField = (typeof MEMBER_SORT_FIELDS)[number];

export const MEMBER_SORT_WHITELIST = createSortFieldWhitelist(MEMBER_SORT_FIELDS);

/** 业务排序字段到安全列（含别名）的映射 */
export const MEMBER_SORT_COLUMNS: Readonly<Record<MemberSortField, string>> = Object.freeze({
  id: `${MEMBERS_TABLE_ALIAS}.id`,
  name: `${MEMBERS_TABLE_ALIAS}.name`,
  email: `${MEMBERS_TABLE_ALIAS}.email`,
  createdAt: `${MEMBERS_TABLE_ALIAS}.createdAt`,
});

export const MEMBER_TIE_BREAKER_COLUMN = `${MEMBERS_TABLE_ALIAS}.id`;

export const MEMBER_SEARCH_OPTIONS: TextSearchOptions = Object.freeze({
  searchColumns: [
    `${MEMBERS_TABLE_ALIAS}.name`,
    `${MEMBERS_TABLE_ALIAS}.email`,
    `${MEMBERS_TABLE_ALIAS}.description`,
  ],
  exactColumns: [`${MEMBERS_TABLE_ALIAS}.id`],
  searchMode: 'OR',
});

export const MEMBER_TABLE_COLUMNS: ReadonlyArray<TableColumn> = Object.freeze([
  { field: 'id', label: 'ID' },
  { field: 'name', label: '姓名' },
  { field: 'email', label: '邮箱' },
  { field: 'description', label: '描述', sortable: false },
  { field: 'createdAt', label: '创建时间' },
]);
