// src/modules/members/member.entity.ts

import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

/**
 * 成员实体
 * 对应数据库表：members
 * 作为表格视图的示例数据源
 */
@Entity('members')
@Index('uk_members_email', ['email'], { unique: true })
export class MemberEntity {
  @PrimaryGeneratedColumn({ type: 'int', comment: '成员主键 ID' })
  id!: number;

  @Column({ type: 'varchar', length: 100, comment: '姓名' })
  name!: string;

  @Column({ type: 'varchar', length: 255, comment: '邮箱' })
  email!: string;

  /**
   * 描述
   * 可为空，最大长度 512 个字符
   */
  @Column({ type: 'varchar', length: 512, nullable: true, comment: '描述' })
  description!: string | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamp', comment: '创建时间' })
  createdAt!: Date;
}
