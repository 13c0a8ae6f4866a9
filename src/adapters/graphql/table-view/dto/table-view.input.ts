// src/adapters/graphql/table-view/dto/table-view.input.ts
import { Field, InputType } from '@nestjs/graphql';
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

/**
 * 表格视图查询输入参数
 */
@InputType({ description: '表格视图查询（地址栏查询串）' })
export class TableViewInput {
  @Field(() => String, {
    nullable: true,
    description: '地址栏查询串，如 sort_field=name&sort_direction=desc&page=2',
  })
  @IsOptional()
  @IsString({ message: '查询串必须是字符串' })
  @MaxLength(2048, { message: '查询串长度不能超过 2048 个字符' })
  query?: string;
}

/**
 * 表格导出输入参数
 */
@InputType({ description: '表格导出' })
export class TableExportInput extends TableViewInput {
  @Field(() => String, { description: '导出格式：csv / xlsx / pdf' })
  @IsString({ message: '导出格式必须是字符串' })
  @IsNotEmpty({ message: '导出格式不能为空' })
  @MaxLength(16, { message: '导出格式长度不能超过 16 个字符' })
  format!: string;
}
