// src/adapters/graphql/table-view/dto/table-view.dto.ts
import { Field, Int, ObjectType } from '@nestjs/graphql';

@ObjectType({ description: '当前排序状态' })
export class SortStateDTO {
  @Field({ description: '排序字段' })
  field!: string;

  @Field({ description: '排序方向：asc / desc' })
  direction!: string;
}

@ObjectType({ description: '列头排序链接' })
export class SortHeaderDTO {
  @Field({ description: '列字段' })
  field!: string;

  @Field({ description: '列标题' })
  label!: string;

  @Field({ description: '是否可排序' })
  sortable!: boolean;

  @Field({ description: '是否为当前排序列' })
  active!: boolean;

  @Field(() => String, { nullable: true, description: '当前排序方向（仅当前排序列）' })
  direction!: string | null;

  @Field(() => String, { nullable: true, description: '点击该列头后的查询串' })
  query!: string | null;
}

@ObjectType({ description: '分页元数据' })
export class PaginationMetadataDTO {
  @Field(() => Int)
  pageNumber!: number;

  @Field(() => Int)
  pageSize!: number;

  @Field(() => Int)
  totalEntries!: number;

  @Field(() => Int)
  totalPages!: number;
}

@ObjectType({ description: '页码链接' })
export class PageLinkDTO {
  @Field(() => Int)
  page!: number;

  @Field()
  query!: string;

  @Field({ description: '是否为当前页' })
  current!: boolean;
}

@ObjectType({ description: '显示第 from 到 to 条，共 total 条' })
export class PaginationSummaryDTO {
  @Field(() => Int)
  from!: number;

  @Field(() => Int)
  to!: number;

  @Field(() => Int)
  total!: number;
}

@ObjectType({ description: '分页视图' })
export class PaginationViewDTO {
  @Field(() => PaginationMetadataDTO)
  metadata!: PaginationMetadataDTO;

  @Field(() => String, { nullable: true, description: '上一页查询串' })
  previous!: string | null;

  @Field(() => String, { nullable: true, description: '下一页查询串' })
  next!: string | null;

  @Field(() => [PageLinkDTO], { description: '页码窗口' })
  pages!: PageLinkDTO[];

  @Field(() => PaginationSummaryDTO)
  summary!: PaginationSummaryDTO;
}

@ObjectType({ description: '表格视图状态' })
export class TableViewDTO {
  @Field(() => SortStateDTO)
  sort!: SortStateDTO;

  @Field({ description: '当前搜索词' })
  searchTerm!: string;

  @Field({ description: '规范化后的当前查询串' })
  query!: string;

  @Field(() => [SortHeaderDTO])
  headers!: SortHeaderDTO[];

  @Field(() => PaginationViewDTO)
  pagination!: PaginationViewDTO;
}

@ObjectType({ description: '表格导出结果' })
export class TableExportResult {
  @Field({ description: '文件名' })
  filename!: string;

  @Field({ description: '内容类型（MIME）' })
  contentType!: string;

  @Field({ description: '文件内容（Base64）' })
  contentBase64!: string;
}
