// src/core/table-view/index.ts
// 表格视图状态引擎的统一入口

export * from './page-window.policy';
export * from './query-string';
export * from './search-term.policy';
export * from './sort-state.policy';
export * from './table-data-source.ports';
export * from './table-view.policy';
export * from './table-view.types';
