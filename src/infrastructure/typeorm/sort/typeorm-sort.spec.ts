// src/infrastructure/typeorm/sort/typeorm-sort.spec.ts
import { TABLE_VIEW_ERROR } from '@core/common/errors/domain-error';
import { createSortFieldWhitelist } from '@core/sort/sort-field.whitelist';
import { createQueryBuilderMock } from '@src/utils/test/query-builder-mock';
import { TypeOrmSort } from './typeorm-sort';

describe('TypeOrmSort', () => {
  const whitelist = createSortFieldWhitelist(['id', 'name'] as const);
  const sort = new TypeOrmSort(whitelist, { id: 'm.id', name: 'm.name' }, 'm.id');

  it('解析白名单字段为安全列名，非法字段返回 null', () => {
    expect(sort.resolveColumn('name')).toBe('m.name');
    expect(sort.resolveColumn('password')).toBeNull();
  });

  it('生成 ORDER BY 列表并追加同方向的稳定副键', () => {
    expect(sort.orderings({ field: 'name', direction: 'desc' })).toEqual([
      { column: 'm.name', direction: 'DESC' },
      { column: 'm.id', direction: 'DESC' },
    ]);
  });

  it('主排序列即副键时不重复追加', () => {
    expect(sort.orderings({ field: 'id', direction: 'asc' })).toEqual([
      { column: 'm.id', direction: 'ASC' },
    ]);
  });

  it('白名单内但映射为空的字段抛出 SORT_FIELD_NOT_ALLOWED', () => {
    const broken = new TypeOrmSort(whitelist, { id: 'm.id', name: '' });
    expect(() => broken.orderings({ field: 'name', direction: 'asc' })).toThrow(
      expect.objectContaining({ code: TABLE_VIEW_ERROR.SORT_FIELD_NOT_ALLOWED }),
    );
  });

  it('apply 覆盖已有排序', () => {
    const { root } = createQueryBuilderMock<{ id: number }>({ rows: [] });
    root.qb.orderBy('m.createdAt', 'ASC');

    sort.apply(root.qb, { field: 'name', direction: 'asc' });

    expect(root.state.orders).toEqual([
      { column: 'm.name', direction: 'ASC' },
      { column: 'm.id', direction: 'ASC' },
    ]);
  });
});
