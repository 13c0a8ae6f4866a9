// src/core/config/server.config.ts
import { ConfigFactory } from '@nestjs/config';

export interface ServerSettings {
  readonly host: string;
  readonly port: number;
  readonly cors: {
    readonly enabled: boolean;
    /** 为空表示反射请求来源 */
    readonly origins: ReadonlyArray<string>;
    readonly credentials: boolean;
  };
}

const splitList = (raw: string | undefined): string[] =>
  (raw ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

const serverConfig: ConfigFactory = () => {
  const server: ServerSettings = {
    host: process.env.APP_HOST || '127.0.0.1',
    port: parseInt(process.env.APP_PORT || '3000', 10),
    cors: {
      enabled: process.env.APP_CORS_ENABLED !== 'false',
      origins: splitList(process.env.APP_CORS_ORIGINS),
      credentials: process.env.APP_CORS_CREDENTIALS !== 'false',
    },
  };
  return { server };
};

export default serverConfig;
