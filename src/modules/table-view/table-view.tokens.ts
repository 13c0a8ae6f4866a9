// src/modules/table-view/table-view.tokens.ts
// 表格视图相关的 DI token 定义

export const TABLE_VIEW_TOKENS = {
  SETTINGS: Symbol('TABLE_VIEW_SETTINGS'),
  EXPORTER: Symbol('TABLE_VIEW_EXPORTER'),
} as const;
