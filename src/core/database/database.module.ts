// src/core/database/database.module.ts

import type { MysqlSettings } from '@core/config/database.config';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';

/**
 * 由 mysql 配置生成 TypeORM 连接选项
 * 实体通过 forFeature 注册后自动加载
 */
export const createDatabaseOptions = (config: ConfigService): TypeOrmModuleOptions => {
  const mysql = config.getOrThrow<MysqlSettings>('mysql');
  return {
    type: 'mysql',
    host: mysql.host,
    port: mysql.port,
    username: mysql.username,
    password: mysql.password,
    database: mysql.database,
    timezone: mysql.timezone,
    synchronize: mysql.synchronize,
    logging: mysql.logging,
    charset: mysql.charset,
    retryAttempts: mysql.retryAttempts,
    extra: { ...mysql.pool, waitForConnections: true, queueLimit: 0 },
    autoLoadEntities: true,
  };
};

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: createDatabaseOptions,
    }),
  ],
  exports: [TypeOrmModule],
})
export class DatabaseModule {}
