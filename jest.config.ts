// jest.config.ts

import type { Config } from 'jest';

/**
 * Jest 配置文件 - 单元测试专用
 * 路径别名与 tsconfig.json 的 paths 保持一致
 */
const config: Config = {
  preset: 'ts-jest',
  testEnvironment: 'node',
  rootDir: './',
  moduleFileExtensions: ['js', 'json', 'ts'],

  // 模块路径映射
  moduleNameMapper: {
    '^@core/(.*)$': '<rootDir>/src/core/$1',
    '^@modules/(.*)$': '<rootDir>/src/modules/$1',
    '^@usecases/(.*)$': '<rootDir>/src/usecases/$1',
    '^@adapters/(.*)$': '<rootDir>/src/adapters/$1',
    '^@app-types/(.*)$': '<rootDir>/src/types/$1',
    '^@src/(.*)$': '<rootDir>/src/$1',
    '^@test/(.*)$': '<rootDir>/test/$1',
  },

  // 只匹配 src 下的单元测试
  testRegex: '.*\\.spec\\.ts$',
  testPathIgnorePatterns: ['/node_modules/', '/dist/', '/test/'],

  transform: {
    '^.+\\.(t|j)s$': ['ts-jest', { tsconfig: 'tsconfig.json' }],
  },

  collectCoverageFrom: [
    'src/**/*.ts',
    '!**/*.spec.ts',
    '!src/utils/test/**',
    '!**/*.dto.ts',
    '!**/*.entity.ts',
    '!**/*.types.ts',
    '!**/main.ts',
  ],
  coverageDirectory: '<rootDir>/coverage',

  setupFilesAfterEnv: ['<rootDir>/test/setup-unit.ts'],

  // 清除模拟调用和实例
  clearMocks: true,

  // 每次测试后恢复模拟状态
  restoreMocks: true,

  testTimeout: 10000,
  errorOnDeprecated: true,
};

export default config;
