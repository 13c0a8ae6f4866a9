// src/core/export/export.policy.ts
// 导出规则与纯函数：格式校验、MIME 类型、文件名

import { DomainError, EXPORT_ERROR } from '@core/common/errors/domain-error';
import { EXPORT_FORMATS, type ExportFormat } from './export.types';

export const EXPORT_CONTENT_TYPES: Readonly<Record<ExportFormat, string>> = Object.freeze({
  csv: 'text/csv',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  pdf: 'application/pdf',
});

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

/**
 * 解析导出格式（大小写不敏感）
 * @throws DomainError(EXPORT_ERROR.FORMAT_NOT_SUPPORTED)
 */
export function parseExportFormat(raw: string): ExportFormat {
  const normalized = raw.trim().toLowerCase();
  if (isExportFormat(normalized)) return normalized;
  throw new DomainError(EXPORT_ERROR.FORMAT_NOT_SUPPORTED, `不支持的导出格式: ${raw}`, {
    format: raw,
    supported: EXPORT_FORMATS,
  });
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * 生成导出文件名：<base>-<yyyyMMddHHmmss>.<ext>（UTC）
 */
export function buildExportFilename(base: string, format: ExportFormat, now: Date): string {
  const stamp = [
    now.getUTCFullYear(),
    pad(now.getUTCMonth() + 1),
    pad(now.getUTCDate()),
    pad(now.getUTCHours()),
    pad(now.getUTCMinutes()),
    pad(now.getUTCSeconds()),
  ].join('');
  return `${base}-${stamp}.${format}`;
}
