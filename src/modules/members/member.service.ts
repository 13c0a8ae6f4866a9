// src/modules/members/member.service.ts

import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, SelectQueryBuilder } from 'typeorm';
import { MemberEntity } from './member.entity';
import { MEMBERS_TABLE_ALIAS } from './members-table.definition';

/**
 * 成员服务类
 * 提供成员表格所需的基础查询
 */
@Injectable()
export class MemberService {
  constructor(
    @InjectRepository(MemberEntity)
    private readonly memberRepository: Repository<MemberEntity>,
  ) {}

  /**
   * 表格查询的基础 QueryBuilder（未排序、未过滤、未分页）
   */
  createTableQueryBuilder(): SelectQueryBuilder<MemberEntity> {
    return this.memberRepository.createQueryBuilder(MEMBERS_TABLE_ALIAS);
  }
}
