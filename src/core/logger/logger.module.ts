// src/core/logger/logger.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LoggerModule as PinoLoggerModule } from 'nestjs-pino';

/**
 * 日志模块
 * 基于 logger 配置装配 pino-http；测试环境下静默
 */
@Module({
  imports: [
    ConfigModule,
    PinoLoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const isTest = configService.get<string>('NODE_ENV') === 'test';
        return {
          pinoHttp: {
            level: isTest ? 'silent' : configService.get<string>('logger.level', 'info'),
            transport: isTest ? undefined : configService.get('logger.transport'),
            redact: configService.get<string[]>('logger.redactFields', []),
            customProps: configService.get('logger.customProps'),
            customLogLevel: configService.get('logger.customLogLevel'),
          },
        };
      },
    }),
  ],
})
export class LoggerModule {}
