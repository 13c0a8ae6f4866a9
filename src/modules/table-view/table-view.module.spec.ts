// src/modules/table-view/table-view.module.spec.ts
import type { ITableExporter } from '@core/export/export.ports';
import type { ExportPayload, ExportRequest } from '@core/export/export.types';
import tableViewConfig from '@core/config/table-view.config';
import { Injectable } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { LoggerModule } from 'nestjs-pino';
import { TableViewModule } from './table-view.module';
import { TableViewService } from './table-view.service';
import { TABLE_VIEW_TOKENS } from './table-view.tokens';

@Injectable()
class StubExporter implements ITableExporter {
  async export<T>(request: ExportRequest<T>): Promise<ExportPayload> {
    return {
      content: Buffer.from(String(request.rows.length)),
      contentType: request.contentType,
      filename: request.filename,
    };
  }
}

const compile = (exporter?: typeof StubExporter): Promise<TestingModule> =>
  Test.createTestingModule({
    imports: [
      ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true, load: [tableViewConfig] }),
      LoggerModule.forRoot({ pinoHttp: { level: 'silent' } }),
      TableViewModule.register({ exporter }),
    ],
  }).compile();

describe('TableViewModule', () => {
  it('从 TABLE_VIEW_* 环境变量装配设置', async () => {
    const module = await compile();

    expect(module.get(TableViewService).settings).toEqual({
      distance: 5,
      defaultSortField: 'id',
      defaultPageSize: 10,
      maxPageSize: 100,
    });
    expect(module.get(TABLE_VIEW_TOKENS.SETTINGS)).toBe(module.get(TableViewService).settings);

    await module.close();
  });

  it('提供导出器时注册 EXPORTER', async () => {
    const module = await compile(StubExporter);

    expect(module.get(TABLE_VIEW_TOKENS.EXPORTER)).toBeInstanceOf(StubExporter);

    await module.close();
  });

  it('未提供导出器时不注册 EXPORTER', async () => {
    const module = await compile();

    expect(() => module.get(TABLE_VIEW_TOKENS.EXPORTER)).toThrow();

    await module.close();
  });
});
