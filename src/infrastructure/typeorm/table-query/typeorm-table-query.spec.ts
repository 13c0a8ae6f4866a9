// src/infrastructure/typeorm/table-query/typeorm-table-query.spec.ts
import { TABLE_VIEW_ERROR } from '@core/common/errors/domain-error';
import { createSortFieldWhitelist } from '@core/sort/sort-field.whitelist';
import { createQueryBuilderMock } from '@src/utils/test/query-builder-mock';
import { TypeOrmTablePaginator } from '../pagination/typeorm-paginator';
import { TypeOrmTextSearch } from '../search/typeorm-search';
import { TypeOrmSort } from '../sort/typeorm-sort';
import { TypeOrmTableQuery } from './typeorm-table-query';

interface Row {
  id: number;
  name: string;
}

const ROWS: Row[] = [
  { id: 1, name: 'Ann' },
  { id: 2, name: 'Annie' },
  { id: 3, name: 'Joanna' },
];

describe('TypeOrmTableQuery', () => {
  const whitelist = createSortFieldWhitelist(['id', 'name'] as const);
  const tableQuery = new TypeOrmTableQuery<Row, 'id' | 'name'>({
    sort: new TypeOrmSort(whitelist, { id: 'm.id', name: 'm.name' }, 'm.id'),
    search: new TypeOrmTextSearch(),
    searchOptions: { searchColumns: ['m.name'] },
    paginator: new TypeOrmTablePaginator(),
  });

  it('fetchPage 依次应用搜索、排序与分页，不修改调用方的 QueryBuilder', async () => {
    const { root, instances } = createQueryBuilderMock<Row>({ rows: ROWS });

    const result = await tableQuery.fetchPage({
      qb: root.qb,
      query: {
        sort: { field: 'name', direction: 'desc' },
        searchTerm: 'ann',
        page: { page: 1, pageSize: 2 },
      },
    });

    expect(root.state).toEqual({ wheres: [], orders: [] });
    const prepared = instances[1];
    expect(prepared.state.wheres).toEqual([
      { clause: '(LOWER(m.name) LIKE LOWER(:q))', params: { q: '%ann%' } },
    ]);
    expect(prepared.state.orders).toEqual([
      { column: 'm.name', direction: 'DESC' },
      { column: 'm.id', direction: 'DESC' },
    ]);
    expect(result.items).toEqual([ROWS[0], ROWS[1]]);
    expect(result.metadata).toEqual({
      pageNumber: 1,
      pageSize: 2,
      totalEntries: 3,
      totalPages: 2,
    });
  });

  it('fetchAll 使用相同的搜索与排序且不分页', async () => {
    const { root, instances } = createQueryBuilderMock<Row>({ rows: ROWS });

    const items = await tableQuery.fetchAll({
      qb: root.qb,
      query: { sort: { field: 'id', direction: 'asc' }, searchTerm: '' },
    });

    expect(items).toEqual(ROWS);
    expect(instances).toHaveLength(2);
    expect(instances[1].state).toEqual({
      wheres: [],
      orders: [{ column: 'm.id', direction: 'ASC' }],
      skip: undefined,
      take: undefined,
    });
  });

  it('fetchAll 的驱动错误包装为 DB_QUERY_FAILED', async () => {
    const { root } = createQueryBuilderMock<Row>({ rows: [], failWith: new Error('timeout') });

    await expect(
      tableQuery.fetchAll({
        qb: root.qb,
        query: { sort: { field: 'id', direction: 'asc' }, searchTerm: '' },
      }),
    ).rejects.toMatchObject({ code: TABLE_VIEW_ERROR.DB_QUERY_FAILED, message: '导出查询失败' });
  });
});
