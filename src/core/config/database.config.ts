// src/core/config/database.config.ts
import { ConfigFactory } from '@nestjs/config';

/**
 * MySQL 连接设置
 * 表格查询只读，不依赖 synchronize；生产环境保持关闭
 */
export interface MysqlSettings {
  readonly host: string;
  readonly port: number;
  readonly username?: string;
  readonly password?: string;
  readonly database?: string;
  readonly timezone: string;
  readonly synchronize: boolean;
  readonly logging: boolean;
  readonly charset: string;
  readonly retryAttempts: number;
  readonly pool: {
    readonly connectionLimit: number;
    readonly connectTimeout: number;
  };
}

const databaseConfig: ConfigFactory = () => {
  const mysql: MysqlSettings = {
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '3306', 10),
    username: process.env.DB_USER,
    password: process.env.DB_PASS,
    database: process.env.DB_NAME,
    timezone: process.env.DB_TIMEZONE || 'Z',
    synchronize: process.env.DB_SYNCHRONIZE === 'true',
    logging: process.env.DB_LOGGING === 'true',
    // 搜索词可能包含 emoji
    charset: 'utf8mb4',
    retryAttempts: parseInt(process.env.DB_RETRY_ATTEMPTS || '3', 10),
    pool: {
      connectionLimit: parseInt(process.env.DB_POOL_SIZE || '10', 10),
      connectTimeout: 60000,
    },
  };
  return { mysql };
};

export default databaseConfig;
