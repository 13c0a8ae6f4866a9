// src/modules/members/members.module.ts

import { TypeOrmTablePaginator } from '@src/infrastructure/typeorm/pagination/typeorm-paginator';
import { TypeOrmTextSearch } from '@src/infrastructure/typeorm/search/typeorm-search';
import { TypeOrmSort } from '@src/infrastructure/typeorm/sort/typeorm-sort';
import { TypeOrmTableQuery } from '@src/infrastructure/typeorm/table-query/typeorm-table-query';
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ExportMembersTableUsecase } from '@usecases/members/export-members-table.usecase';
import { ListMembersTableUsecase } from '@usecases/members/list-members-table.usecase';
import { MemberEntity } from './member.entity';
import { MemberService } from './member.service';
import {
  MEMBER_SEARCH_OPTIONS,
  MEMBER_SORT_COLUMNS,
  MEMBER_SORT_WHITELIST,
  MEMBER_TIE_BREAKER_COLUMN,
  type MemberSortField,
} from './members-table.definition';
import { MEMBERS_TOKENS } from './members.tokens';

/**
 * 成员表格的数据源：白名单排序 + 稳定副键、多列文本搜索、Offset 分页
 */
export function createMembersTableQuery(): TypeOrmTableQuery<MemberEntity, MemberSortField> {
  return new TypeOrmTableQuery<MemberEntity, MemberSortField>({
    sort: new TypeOrmSort(MEMBER_SORT_WHITELIST, MEMBER_SORT_COLUMNS, MEMBER_TIE_BREAKER_COLUMN),
    search: new TypeOrmTextSearch(),
    searchOptions: MEMBER_SEARCH_OPTIONS,
    paginator: new TypeOrmTablePaginator(),
  });
}

/**
 * 成员模块
 * 绑定成员表格的数据源实现，并导出表格用例
 */
@Module({
  imports: [TypeOrmModule.forFeature([MemberEntity])],
  providers: [
    MemberService,
    {
      provide: MEMBERS_TOKENS.TABLE_QUERY,
      useFactory: createMembersTableQuery,
    },
    ListMembersTableUsecase,
    ExportMembersTableUsecase,
  ],
  exports: [MemberService, ListMembersTableUsecase, ExportMembersTableUsecase],
})
export class MembersModule {}
