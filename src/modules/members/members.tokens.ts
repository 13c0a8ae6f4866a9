// src/modules/members/members.tokens.ts

export const MEMBERS_TOKENS = {
  TABLE_QUERY: Symbol('MEMBERS_TABLE_QUERY'),
} as const;
