// src/adapters/graphql/members-table/members-table.resolver.ts

import { ValidateInput } from '@core/common/errors/validate-input.decorator';
import { Args, Query, Resolver } from '@nestjs/graphql';
import { ExportMembersTableUsecase } from '@usecases/members/export-members-table.usecase';
import { ListMembersTableUsecase } from '@usecases/members/list-members-table.usecase';
import { TableExportInput, TableViewInput } from '../table-view/dto/table-view.input';
import { TableExportResult } from '../table-view/dto/table-view.dto';
import { mapExportPayloadToDTO, mapTableViewToDTO } from '../table-view/table-view.mapper';
import { MembersTableResult } from './dto/member.dto';

/**
 * 成员表格 GraphQL Resolver
 * 地址栏查询串原样传入，排序 / 搜索 / 分页状态全部由服务端解析
 */
@Resolver(() => MembersTableResult)
export class MembersTableResolver {
  constructor(
    private readonly listMembersTableUsecase: ListMembersTableUsecase,
    private readonly exportMembersTableUsecase: ExportMembersTableUsecase,
  ) {}

  @Query(() => MembersTableResult, { description: '成员表格（排序 / 搜索 / 分页）' })
  @ValidateInput()
  async membersTable(@Args('input') input: TableViewInput): Promise<MembersTableResult> {
    const result = await this.listMembersTableUsecase.execute({ query: input.query });
    return {
      view: mapTableViewToDTO(result.view),
      items: result.items.map((member) => ({
        id: member.id,
        name: member.name,
        email: member.email,
        description: member.description,
        createdAt: member.createdAt,
      })),
    };
  }

  @Query(() => TableExportResult, { description: '按当前排序与搜索导出成员表格' })
  @ValidateInput()
  async exportMembersTable(@Args('input') input: TableExportInput): Promise<TableExportResult> {
    const payload = await this.exportMembersTableUsecase.execute({
      query: input.query,
      format: input.format,
    });
    return mapExportPayloadToDTO(payload);
  }
}
