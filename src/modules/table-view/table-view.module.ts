// src/modules/table-view/table-view.module.ts

import type { ITableExporter } from '@core/export/export.ports';
import { DynamicModule, Module, Provider, Type } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TableViewService } from './table-view.service';
import { resolveTableViewSettings } from './table-view.settings';
import { TABLE_VIEW_TOKENS } from './table-view.tokens';

export interface TableViewModuleOptions {
  /** 可选的导出器实现；未提供时导出用例返回 EXPORTER_NOT_CONFIGURED */
  readonly exporter?: Type<ITableExporter>;
}

/**
 * 表格视图模块（全局）
 * - 只在 AppModule 中调用一次 register(...) 完成装配
 * - 导出 TableViewService 与（可选的）导出器
 */
@Module({})
export class TableViewModule {
  static register(options: TableViewModuleOptions = {}): DynamicModule {
    const providers: Provider[] = [
      {
        provide: TABLE_VIEW_TOKENS.SETTINGS,
        inject: [ConfigService],
        useFactory: resolveTableViewSettings,
      },
      TableViewService,
    ];
    if (options.exporter) {
      providers.push({ provide: TABLE_VIEW_TOKENS.EXPORTER, useClass: options.exporter });
    }

    return {
      module: TableViewModule,
      global: true,
      providers,
      exports: [
        TableViewService,
        TABLE_VIEW_TOKENS.SETTINGS,
        ...(options.exporter ? [TABLE_VIEW_TOKENS.EXPORTER] : []),
      ],
    };
  }
}
