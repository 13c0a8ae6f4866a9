// src/usecases/members/list-members-table.usecase.ts

import type { TableViewModel } from '@core/table-view/table-view.types';
import type { ITableDataSource } from '@core/table-view/table-data-source.ports';
import { MemberEntity } from '@modules/members/member.entity';
import { MemberService } from '@modules/members/member.service';
import {
  MEMBER_SORT_WHITELIST,
  MEMBER_TABLE_COLUMNS,
  type MemberSortField,
} from '@modules/members/members-table.definition';
import { MEMBERS_TOKENS } from '@modules/members/members.tokens';
import { TableViewService } from '@modules/table-view/table-view.service';
import { Inject, Injectable } from '@nestjs/common';
import type { SelectQueryBuilder } from 'typeorm';

export interface MembersTableResult {
  readonly view: TableViewModel;
  readonly items: ReadonlyArray<MemberEntity>;
}

/**
 * 成员表格查询用例
 * - 纯读操作：解析地址栏参数 → 校验排序 → 搜索 + 分页取数 → 组装视图模型
 * - 非法排序字段在取数前抛出，不做任何回退
 */
@Injectable()
export class ListMembersTableUsecase {
  constructor(
    private readonly memberService: MemberService,
    private readonly tableViewService: TableViewService,
    @Inject(MEMBERS_TOKENS.TABLE_QUERY)
    private readonly tableQuery: ITableDataSource<
      SelectQueryBuilder<MemberEntity>,
      MemberEntity,
      MemberSortField
    >,
  ) {}

  /**
   * @param args.query 地址栏查询串（可带前导 ?），为空时使用默认视图
   */
  async execute(args: { readonly query?: string | null }): Promise<MembersTableResult> {
    const params = this.tableViewService.parse(args.query);
    const sort = this.tableViewService.resolveValidatedSort(params, MEMBER_SORT_WHITELIST);
    const searchTerm = this.tableViewService.searchTerm(params);
    const page = this.tableViewService.offsetParams(params);

    const result = await this.tableQuery.fetchPage({
      qb: this.memberService.createTableQueryBuilder(),
      query: { sort, searchTerm, page },
    });

    const view = this.tableViewService.buildView({
      params,
      metadata: result.metadata,
      columns: MEMBER_TABLE_COLUMNS,
    });
    return { view, items: result.items };
  }
}
