// src/core/graphql/graphql.module.ts

import { ApolloServerPluginLandingPageLocalDefault } from '@apollo/server/plugin/landingPage/default';
import { ApolloDriver, ApolloDriverConfig } from '@nestjs/apollo';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GraphQLModule } from '@nestjs/graphql';

const createGraphQLOptions = (config: ConfigService): ApolloDriverConfig => {
  const introspection = config.get<boolean>('graphql.introspection', false);
  return {
    path: config.get<string>('graphql.path', '/graphql'),
    autoSchemaFile: config.get<string>('graphql.schemaDestination'),
    sortSchema: config.get<boolean>('graphql.sortSchema', true),
    introspection,
    includeStacktraceInErrorResponses: config.get<boolean>('graphql.includeStacktrace', false),
    playground: false,
    // 仅在允许 introspection 时挂载本地 Sandbox
    plugins: introspection ? [ApolloServerPluginLandingPageLocalDefault()] : [],
  };
};

/**
 * GraphQL 模块
 * 表格查询与导出均通过 Query 暴露
 */
@Module({
  imports: [
    GraphQLModule.forRootAsync<ApolloDriverConfig>({
      driver: ApolloDriver,
      inject: [ConfigService],
      useFactory: createGraphQLOptions,
    }),
  ],
  exports: [GraphQLModule],
})
export class AppGraphQLModule {}
