// src/core/export/export.policy.spec.ts
import { DomainError, EXPORT_ERROR } from '@core/common/errors/domain-error';
import {
  buildExportFilename,
  EXPORT_CONTENT_TYPES,
  isExportFormat,
  parseExportFormat,
} from './export.policy';

describe('export.policy', () => {
  it('parseExportFormat 大小写不敏感并去除空白', () => {
    expect(parseExportFormat(' CSV ')).toBe('csv');
    expect(parseExportFormat('Pdf')).toBe('pdf');
  });

  it('不支持的格式抛出 FORMAT_NOT_SUPPORTED', () => {
    expect(() => parseExportFormat('docx')).toThrow(DomainError);
    expect(() => parseExportFormat('docx')).toThrow('不支持的导出格式: docx');
    try {
      parseExportFormat('docx');
    } catch (error) {
      expect(error).toMatchObject({ code: EXPORT_ERROR.FORMAT_NOT_SUPPORTED });
    }
  });

  it('isExportFormat 只接受小写格式名', () => {
    expect(isExportFormat('xlsx')).toBe(true);
    expect(isExportFormat('XLSX')).toBe(false);
  });

  it('每种格式都有内容类型', () => {
    expect(EXPORT_CONTENT_TYPES.csv).toBe('text/csv');
    expect(EXPORT_CONTENT_TYPES.pdf).toBe('application/pdf');
  });

  it('文件名带 UTC 时间戳与扩展名', () => {
    const now = new Date(Date.UTC(2024, 0, 5, 3, 4, 9));
    expect(buildExportFilename('members', 'xlsx', now)).toBe('members-20240105030409.xlsx');
  });
});
