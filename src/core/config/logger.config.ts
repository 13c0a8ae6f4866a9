// src/core/config/logger.config.ts
import { ConfigFactory } from '@nestjs/config';
import { IncomingMessage, ServerResponse } from 'http';
import type { LevelWithSilent, TransportMultiOptions, TransportSingleOptions } from 'pino';

const headerValue = (req: IncomingMessage, name: string): string | null => {
  const raw = req.headers?.[name];
  if (raw === undefined) return null;
  return Array.isArray(raw) ? raw.join(',') : raw;
};

/**
 * 4xx 响应附带客户端信息，便于排查被拒绝的表格查询（如非法排序字段）
 */
const clientPropsFor4xx = (req: IncomingMessage, res: ServerResponse): Record<string, unknown> => {
  const statusCode = res.statusCode ?? 0;
  if (statusCode < 400 || statusCode >= 500) return {};

  const url = req.url ?? null;
  return {
    remoteAddress: req.socket?.remoteAddress ?? null,
    xForwardedFor: headerValue(req, 'x-forwarded-for'),
    userAgent: headerValue(req, 'user-agent'),
    method: req.method ?? null,
    url,
    originalUrl: 'originalUrl' in req && typeof req.originalUrl === 'string' ? req.originalUrl : url,
  };
};

const requestLogLevel =
  (graphqlPath: string) =>
  (req: IncomingMessage, res: ServerResponse, err?: Error): LevelWithSilent => {
    if (req.url === '/favicon.ico') return 'silent';
    if (res.statusCode >= 500 || err) return 'error';
    if (res.statusCode > 200) return 'warn';
    // 只记录 GraphQL 的 POST（表格查询与导出）
    if (req.method === 'POST' && req.url === graphqlPath) return 'info';
    return 'silent';
  };

const buildTransport = (
  isDev: boolean,
  logPath: string,
): TransportSingleOptions | TransportMultiOptions => {
  if (isDev) {
    return {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:dd HH:MM:ss',
        messageFormat: '{time} - [{context}] {method} {url} {statusCode} - {msg}',
        ignore: 'hostname,pid,req,context',
      },
    };
  }
  return {
    targets: [
      {
        target: 'pino/file',
        options: { destination: `${logPath}/app.log`, mkdir: true },
        level: 'info',
      },
      {
        target: 'pino/file',
        options: { destination: `${logPath}/error.log`, mkdir: true },
        level: 'error',
      },
    ],
  };
};

const loggerConfig: ConfigFactory = () => {
  const isDev = process.env.NODE_ENV !== 'production';
  const logPath = process.env.LOG_DIR || (isDev ? './logs' : '/var/log/table-view');

  return {
    logger: {
      level: process.env.LOG_LEVEL || (isDev ? 'debug' : 'info'),
      redactFields: ['req.headers.authorization', 'req.headers.cookie'],
      customProps: clientPropsFor4xx,
      customLogLevel: requestLogLevel(process.env.GRAPHQL_PATH || '/graphql'),
      transport: buildTransport(isDev, logPath),
    },
  };
};

export default loggerConfig;
