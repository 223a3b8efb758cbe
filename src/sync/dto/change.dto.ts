import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsInt, IsOptional, Min, ValidateIf } from 'class-validator';
import { GraphError } from '../../common/errors/graph-error';
import { ChangeOp } from '../../graph-store/types/graph.types';
import { OntologyScopedDto } from './ontology-scoped.dto';

export const CHANGE_OPS: readonly ChangeOp[] = ['create', 'update', 'delete'];

/** Common envelope of a proposed entity change. */
export abstract class EntityChangeDto extends OntologyScopedDto {
  @ApiProperty({ enum: CHANGE_OPS, example: 'update' })
  @IsIn(CHANGE_OPS)
  op!: ChangeOp;

  @ApiPropertyOptional({
    description: 'Entity id; required for update and delete, optional on create',
    example: 42,
  })
  @ValidateIf((o: EntityChangeDto) => o.op !== 'create' || o.id !== undefined)
  @IsInt()
  @Min(1)
  id?: number;

  @ApiPropertyOptional({
    description: 'Version the change was based on; stale versions are rejected',
    example: 3,
  })
  @IsOptional()
  @IsInt()
  @Min(1)
  expectedVersion?: number;

  protected requireId(): number {
    if (this.id === undefined) {
      throw new GraphError('ValidationFailed', `id is required for ${this.op}`);
    }
    return this.id;
  }

  protected requireFields<T>(fields: T | undefined): T {
    if (fields === undefined) {
      throw new GraphError('ValidationFailed', `fields are required for ${this.op}`);
    }
    return fields;
  }
}
