// src/infrastructure/typeorm/search/typeorm-search.spec.ts
import { createQueryBuilderMock } from '@src/utils/test/query-builder-mock';
import { TypeOrmTextSearch } from './typeorm-search';

describe('TypeOrmTextSearch', () => {
  const search = new TypeOrmTextSearch();

  describe('buildClause', () => {
    it('OR 模式下任一列命中即可', () => {
      expect(search.buildClause('jane', { searchColumns: ['m.name', 'm.email'] })).toEqual({
        clause: '(LOWER(m.name) LIKE LOWER(:q) OR LOWER(m.email) LIKE LOWER(:q))',
        params: { q: '%jane%' },
      });
    });

    it('AND 模式下所有列都需命中', () => {
      expect(
        search.buildClause('jane', { searchColumns: ['m.name', 'm.email'], searchMode: 'AND' }),
      ).toEqual({
        clause: '(LOWER(m.name) LIKE LOWER(:q) AND LOWER(m.email) LIKE LOWER(:q))',
        params: { q: '%jane%' },
      });
    });

    it('精确列以文本等值匹配，与模糊组取并集', () => {
      expect(
        search.buildClause(' 42 ', { searchColumns: ['m.name'], exactColumns: ['m.id'] }),
      ).toEqual({
        clause: '((LOWER(m.name) LIKE LOWER(:q)) OR CAST(m.id AS CHAR) = :qExact)',
        params: { q: '%42%', qExact: '42' },
      });
    });

    it('只有精确列时只生成等值子句', () => {
      expect(search.buildClause('7', { searchColumns: [], exactColumns: ['m.id'] })).toEqual({
        clause: 'CAST(m.id AS CHAR) = :qExact',
        params: { qExact: '7' },
      });
    });

    it('通配符被转义后作为参数传入', () => {
      expect(search.buildClause('100%_', { searchColumns: ['m.name'] })?.params).toEqual({
        q: '%100\\%\\_%',
      });
    });

    it('空白、过短或没有列时不生成子句', () => {
      expect(search.buildClause('   ', { searchColumns: ['m.name'] })).toBeNull();
      expect(search.buildClause('ab', { searchColumns: ['m.name'], minQueryLength: 3 })).toBeNull();
      expect(search.buildClause('jane', { searchColumns: [] })).toBeNull();
    });
  });

  describe('apply', () => {
    it('有搜索词时追加 where', () => {
      const { root } = createQueryBuilderMock<{ id: number }>({ rows: [] });
      search.apply(root.qb, 'ann', { searchColumns: ['m.name'] });
      expect(root.state.wheres).toEqual([
        { clause: '(LOWER(m.name) LIKE LOWER(:q))', params: { q: '%ann%' } },
      ]);
    });

    it('空搜索词不修改 QueryBuilder', () => {
      const { root } = createQueryBuilderMock<{ id: number }>({ rows: [] });
      search.apply(root.qb, '', { searchColumns: ['m.name'] });
      expect(root.state.wheres).toEqual([]);
    });
  });
});
