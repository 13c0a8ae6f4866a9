// src/adapters/graphql/members-table/dto/member.dto.ts
import { Field, Int, ObjectType } from '@nestjs/graphql';
import { TableViewDTO } from '@src/adapters/graphql/table-view/dto/table-view.dto';

/**
 * 成员信息
 */
@ObjectType({ description: '成员' })
export class MemberDTO {
  @Field(() => Int, { description: '成员 ID' })
  id!: number;

  @Field({ description: '姓名' })
  name!: string;

  @Field({ description: '邮箱' })
  email!: string;

  @Field(() => String, { nullable: true, description: '描述' })
  description!: string | null;

  @Field({ description: '创建时间' })
  createdAt!: Date;
}

@ObjectType({ description: '成员表格：当前页数据与视图状态' })
export class MembersTableResult {
  @Field(() => TableViewDTO)
  view!: TableViewDTO;

  @Field(() => [MemberDTO])
  items!: MemberDTO[];
}
