// src/app.module.ts

import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { GraphQLAdapterModule } from './adapters/graphql/graphql-adapter.module';
import { GqlAllExceptionsFilter } from './core/common/filters/graphql-exception.filter';
import { AppConfigModule } from './core/config/config.module';
import { DatabaseModule } from './core/database/database.module';
import { AppGraphQLModule } from './core/graphql/graphql.module';
import { LoggerModule } from './core/logger/logger.module';
import { TableViewModule } from './modules/table-view/table-view.module';

@Module({
  imports: [
    AppConfigModule,
    LoggerModule,
    DatabaseModule,
    AppGraphQLModule,
    // 表格视图引擎（全局）；宿主应用可在此传入导出器实现
    TableViewModule.register(),
    GraphQLAdapterModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: GqlAllExceptionsFilter,
    },
  ],
})
export class AppModule {}
