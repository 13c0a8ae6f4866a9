// src/core/table-view/table-view.policy.spec.ts
import { DomainError, TABLE_VIEW_ERROR } from '@core/common/errors/domain-error';
import { buildTableView, resolveTableViewConfig } from './table-view.policy';

describe('table-view.policy', () => {
  describe('resolveTableViewConfig', () => {
    it('未提供配置时使用默认值', () => {
      expect(resolveTableViewConfig()).toEqual({
        distance: 5,
        defaultSortField: 'id',
        defaultPageSize: 10,
      });
    });

    it('部分覆盖', () => {
      expect(resolveTableViewConfig({ distance: 3 })).toEqual({
        distance: 3,
        defaultSortField: 'id',
        defaultPageSize: 10,
      });
    });

    it.each([
      [{ distance: 0 }],
      [{ distance: Number.NaN }],
      [{ defaultPageSize: 2.5 }],
      [{ defaultSortField: '  ' }],
    ])('非法配置 %p 抛出 INVALID_CONFIG', (partial) => {
      expect(() => resolveTableViewConfig(partial)).toThrow(DomainError);
      try {
        resolveTableViewConfig(partial);
      } catch (error) {
        expect(error).toMatchObject({ code: TABLE_VIEW_ERROR.INVALID_CONFIG });
      }
    });
  });

  describe('buildTableView', () => {
    it('组装排序、搜索、规范查询串、表头与分页视图', () => {
      const params = {
        sort_field: 'name',
        sort_direction: 'desc',
        page: '2',
        filter: { isearch: 'ann' },
      };
      const view = buildTableView({
        params,
        metadata: { pageNumber: 2, pageSize: 10, totalEntries: 25, totalPages: 3 },
        columns: [
          { field: 'id', label: 'ID' },
          { field: 'name', label: '姓名' },
        ],
        config: resolveTableViewConfig(),
      });

      expect(view.sort).toEqual({ direction: 'desc', field: 'name' });
      expect(view.searchTerm).toBe('ann');
      expect(view.query).toBe('filter%5Bisearch%5D=ann&page=2&sort_direction=desc&sort_field=name');
      expect(view.headers[1]).toMatchObject({
        active: true,
        direction: 'desc',
        query: 'filter%5Bisearch%5D=ann&page=2&sort_direction=asc&sort_field=name',
      });
      expect(view.pagination.pages.map((link) => link.page)).toEqual([1, 2, 3]);
      expect(view.pagination.previous).toBe(
        'filter%5Bisearch%5D=ann&page=1&sort_direction=desc&sort_field=name',
      );
      expect(view.pagination.summary).toEqual({ from: 11, to: 20, total: 25 });
    });
  });
});
