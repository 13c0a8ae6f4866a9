// src/usecases/members/list-members-table.usecase.spec.ts
import { TABLE_VIEW_ERROR } from '@core/common/errors/domain-error';
import { MemberEntity } from '@modules/members/member.entity';
import { MemberService } from '@modules/members/member.service';
import { createMembersTableQuery } from '@modules/members/members.module';
import { MEMBERS_TOKENS } from '@modules/members/members.tokens';
import { TableViewService } from '@modules/table-view/table-view.service';
import { TABLE_VIEW_TOKENS } from '@modules/table-view/table-view.tokens';
import { Test } from '@nestjs/testing';
import { createLoggerMock } from '@src/utils/test/logger-mock';
import { createQueryBuilderMock } from '@src/utils/test/query-builder-mock';
import { ListMembersTableUsecase } from './list-members-table.usecase';

const member = (id: number, name: string): MemberEntity => ({
  id,
  name,
  email: `${name.toLowerCase()}@example.com`,
  description: null,
  createdAt: new Date(Date.UTC(2024, 0, id)),
});

describe('ListMembersTableUsecase', () => {
  let usecase: ListMembersTableUsecase;
  const memberService = { createTableQueryBuilder: jest.fn() };

  beforeEach(async () => {
    const module = await Test.createTestingModule({
      providers: [
        ListMembersTableUsecase,
        TableViewService,
        { provide: MemberService, useValue: memberService },
        { provide: MEMBERS_TOKENS.TABLE_QUERY, useFactory: createMembersTableQuery },
        {
          provide: TABLE_VIEW_TOKENS.SETTINGS,
          useValue: { distance: 5, defaultSortField: 'id', defaultPageSize: 10, maxPageSize: 100 },
        },
        createLoggerMock('TableViewService'),
      ],
    }).compile();

    usecase = module.get(ListMembersTableUsecase);
  });

  it('按地址栏状态排序、搜索并组装视图', async () => {
    const rows = [member(3, 'Joanna'), member(2, 'Annie'), member(1, 'Ann')];
    const { root, instances } = createQueryBuilderMock<MemberEntity>({ rows });
    memberService.createTableQueryBuilder.mockReturnValue(root.qb);

    const result = await usecase.execute({
      query: '?sort_field=name&sort_direction=desc&filter%5Bisearch%5D=ann',
    });

    const prepared = instances[1];
    expect(prepared.state.orders).toEqual([
      { column: 'member.name', direction: 'DESC' },
      { column: 'member.id', direction: 'DESC' },
    ]);
    expect(prepared.state.wheres).toEqual([
      {
        clause:
          '((LOWER(member.name) LIKE LOWER(:q) OR LOWER(member.email) LIKE LOWER(:q) OR LOWER(member.description) LIKE LOWER(:q)) OR CAST(member.id AS CHAR) = :qExact)',
        params: { q: '%ann%', qExact: 'ann' },
      },
    ]);

    expect(result.items).toEqual(rows);
    expect(result.view.sort).toEqual({ direction: 'desc', field: 'name' });
    expect(result.view.searchTerm).toBe('ann');
    expect(result.view.query).toBe('filter%5Bisearch%5D=ann&sort_direction=desc&sort_field=name');
    expect(result.view.headers.find((header) => header.field === 'name')).toEqual({
      field: 'name',
      label: '姓名',
      sortable: true,
      active: true,
      direction: 'desc',
      query: 'filter%5Bisearch%5D=ann&sort_direction=asc&sort_field=name',
    });
    expect(result.view.pagination).toEqual({
      metadata: { pageNumber: 1, pageSize: 10, totalEntries: 3, totalPages: 1 },
      previous: null,
      next: null,
      pages: [],
      summary: { from: 1, to: 3, total: 3 },
    });
  });

  it('非法排序字段在取数前抛出', async () => {
    await expect(
      usecase.execute({ query: 'sort_field=password&sort_direction=asc' }),
    ).rejects.toMatchObject({ code: TABLE_VIEW_ERROR.SORT_FIELD_NOT_ALLOWED });
    expect(memberService.createTableQueryBuilder).not.toHaveBeenCalled();
  });

  it('页码超出末页时展示最后一页', async () => {
    const rows = Array.from({ length: 25 }, (_, i) => member(i + 1, `Member${i + 1}`));
    const { root } = createQueryBuilderMock<MemberEntity>({ rows });
    memberService.createTableQueryBuilder.mockReturnValue(root.qb);

    const result = await usecase.execute({ query: 'page=50' });

    expect(result.items.map((item) => item.id)).toEqual([21, 22, 23, 24, 25]);
    expect(result.view.pagination).toEqual({
      metadata: { pageNumber: 3, pageSize: 10, totalEntries: 25, totalPages: 3 },
      previous: 'page=2',
      next: null,
      pages: [
        { page: 1, query: 'page=1', current: false },
        { page: 2, query: 'page=2', current: false },
        { page: 3, query: 'page=3', current: true },
      ],
      summary: { from: 21, to: 25, total: 25 },
    });
  });

  it('超出安全整数范围的页码按第 1 页查询', async () => {
    const rows = Array.from({ length: 12 }, (_, i) => member(i + 1, `Member${i + 1}`));
    const { root } = createQueryBuilderMock<MemberEntity>({ rows });
    memberService.createTableQueryBuilder.mockReturnValue(root.qb);

    const result = await usecase.execute({ query: 'page=99999999999999999999' });

    expect(result.items).toHaveLength(10);
    expect(result.view.pagination.metadata).toEqual({
      pageNumber: 1,
      pageSize: 10,
      totalEntries: 12,
      totalPages: 2,
    });
  });

  it('空结果集回到第 1 页且不生成页码', async () => {
    const { root } = createQueryBuilderMock<MemberEntity>({ rows: [] });
    memberService.createTableQueryBuilder.mockReturnValue(root.qb);

    const result = await usecase.execute({ query: 'page=4' });

    expect(result.items).toEqual([]);
    expect(result.view.query).toBe('page=4');
    expect(result.view.pagination).toEqual({
      metadata: { pageNumber: 1, pageSize: 10, totalEntries: 0, totalPages: 0 },
      previous: null,
      next: null,
      pages: [],
      summary: { from: 0, to: 0, total: 0 },
    });
  });
});
