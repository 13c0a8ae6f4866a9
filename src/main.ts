// src/main.ts
import 'reflect-metadata';

import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import type { ServerSettings } from './core/config/server.config';

/**
 * 应用程序启动函数
 * 使用 NestJS ConfigService 获取配置信息
 */
async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  // 使用 PinoLogger 接管 Nest 内部日志
  const logger = app.get(Logger);
  app.useLogger(logger);

  const configService = app.get<ConfigService>(ConfigService);

  const server = configService.getOrThrow<ServerSettings>('server');
  const graphqlPath = configService.get<string>('graphql.path', '/graphql');
  const nodeEnv = configService.get<string>('NODE_ENV', 'development');

  if (server.cors.enabled) {
    app.enableCors({
      origin: server.cors.origins.length > 0 ? [...server.cors.origins] : true,
      credentials: server.cors.credentials,
    });
  }

  await app.listen(server.port, server.host);

  logger.log(
    `🚀 表格视图服务在 http://${server.host}:${server.port}${graphqlPath} 上以 ${nodeEnv} 模式启动成功`,
  );
}

void bootstrap();
