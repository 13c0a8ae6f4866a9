// src/core/search/search.policy.spec.ts
import { buildContainsPattern, escapeLikePattern, shouldApplySearch } from './search.policy';

describe('search.policy', () => {
  it('shouldApplySearch 按去除空白后的长度判断', () => {
    expect(shouldApplySearch('')).toBe(false);
    expect(shouldApplySearch('   ')).toBe(false);
    expect(shouldApplySearch('a')).toBe(true);
    expect(shouldApplySearch('ab', 3)).toBe(false);
    expect(shouldApplySearch(' abc ', 3)).toBe(true);
    expect(shouldApplySearch('a', 0)).toBe(true);
  });

  it('escapeLikePattern 转义反斜杠、% 与 _', () => {
    expect(escapeLikePattern('50%_a\\b')).toBe('50\\%\\_a\\\\b');
  });

  it('buildContainsPattern 包裹为 %term%', () => {
    expect(buildContainsPattern('jane')).toBe('%jane%');
    expect(buildContainsPattern('100%')).toBe('%100\\%%');
  });
});
