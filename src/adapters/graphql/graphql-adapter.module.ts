// src/adapters/graphql/graphql-adapter.module.ts

import { MembersModule } from '@modules/members/members.module';
import { Module } from '@nestjs/common';
import { MembersTableResolver } from './members-table/members-table.resolver';

/**
 * GraphQL 适配器模块
 * 统一管理 GraphQL Resolvers，遵循适配器层架构原则
 */
@Module({
  imports: [MembersModule],
  providers: [MembersTableResolver],
})
export class GraphQLAdapterModule {}
