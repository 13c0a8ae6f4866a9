// src/usecases/members/export-members-table.usecase.ts

import { DomainError, EXPORT_ERROR } from '@core/common/errors/domain-error';
import {
  buildExportFilename,
  EXPORT_CONTENT_TYPES,
  parseExportFormat,
} from '@core/export/export.policy';
import type { ITableExporter } from '@core/export/export.ports';
import type { ExportPayload } from '@core/export/export.types';
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
import { TABLE_VIEW_TOKENS } from '@modules/table-view/table-view.tokens';
import { Inject, Injectable, Optional } from '@nestjs/common';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';
import type { SelectQueryBuilder } from 'typeorm';

/**
 * 成员表格导出用例
 * 与屏幕渲染使用同一套排序与搜索条件，取全部行（不分页）交给导出器
 */
@Injectable()
export class ExportMembersTableUsecase {
  constructor(
    private readonly memberService: MemberService,
    private readonly tableViewService: TableViewService,
    @Inject(MEMBERS_TOKENS.TABLE_QUERY)
    private readonly tableQuery: ITableDataSource<
      SelectQueryBuilder<MemberEntity>,
      MemberEntity,
      MemberSortField
    >,
    @InjectPinoLogger('ExportMembersTableUsecase')
    private readonly logger: PinoLogger,
    @Optional()
    @Inject(TABLE_VIEW_TOKENS.EXPORTER)
    private readonly exporter?: ITableExporter,
  ) {}

  /**
   * @param args.query 地址栏查询串
   * @param args.format 导出格式（csv / xlsx / pdf，大小写不敏感）
   * @param args.now 生成文件名用的时间，默认当前时间
   */
  async execute(args: {
    readonly query?: string | null;
    readonly format: string;
    readonly now?: Date;
  }): Promise<ExportPayload> {
    const format = parseExportFormat(args.format);
    if (!this.exporter) {
      throw new DomainError(EXPORT_ERROR.EXPORTER_NOT_CONFIGURED, '未配置表格导出器', { format });
    }

    const params = this.tableViewService.parse(args.query);
    const sort = this.tableViewService.resolveValidatedSort(params, MEMBER_SORT_WHITELIST);
    const searchTerm = this.tableViewService.searchTerm(params);

    const rows = await this.tableQuery.fetchAll({
      qb: this.memberService.createTableQueryBuilder(),
      query: { sort, searchTerm },
    });

    try {
      const payload = await this.exporter.export({
        format,
        columns: MEMBER_TABLE_COLUMNS,
        rows,
        filename: buildExportFilename('members', format, args.now ?? new Date()),
        contentType: EXPORT_CONTENT_TYPES[format],
      });
      this.logger.info(
        { format, rows: rows.length, filename: payload.filename },
        '成员表格导出完成',
      );
      return payload;
    } catch (error) {
      if (error instanceof DomainError) throw error;
      this.logger.error({ format, error }, '成员表格导出失败');
      throw new DomainError(
        EXPORT_ERROR.EXPORT_FAILED,
        '表格导出失败',
        { format, error: error instanceof Error ? error.message : '未知错误' },
        error,
      );
    }
  }
}
