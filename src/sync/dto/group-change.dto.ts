import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import { GraphError } from '../../common/errors/graph-error';
import { GroupChange } from '../../graph-store/types/graph.types';
import { OntologyScopedDto } from './ontology-scoped.dto';

export const GROUP_OPS: readonly GroupChange['op'][] = [
  'create',
  'expand',
  'collapse',
  'add-member',
  'remove-member',
  'delete',
];

export class CanCreateGroupDto extends OntologyScopedDto {
  @ApiProperty({ example: 1 })
  @IsInt()
  @Min(1)
  parentConceptId!: number;

  @ApiProperty({ type: [Number], example: [2, 3] })
  @IsArray()
  @IsInt({ each: true })
  childConceptIds!: number[];
}

export class GroupChangeDto extends OntologyScopedDto {
  @ApiProperty({ enum: GROUP_OPS, example: 'create' })
  @IsIn(GROUP_OPS)
  op!: GroupChange['op'];

  @ApiPropertyOptional({ description: 'Existing group; every op but create' })
  @IsOptional()
  @IsInt()
  @Min(1)
  groupId?: number;

  @ApiPropertyOptional({ example: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  parentConceptId?: number;

  @ApiPropertyOptional({ type: [Number], example: [2, 3] })
  @IsOptional()
  @IsArray()
  @ArrayMinSize(1)
  @IsInt({ each: true })
  childConceptIds?: number[];

  @ApiPropertyOptional({ description: 'Member for add-member / remove-member' })
  @IsOptional()
  @IsInt()
  @Min(1)
  conceptId?: number;

  @ApiPropertyOptional({ example: 'Mammals' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  groupName?: string;

  @ApiPropertyOptional({ description: 'Delete the group after expanding it' })
  @IsOptional()
  @IsBoolean()
  dissolve?: boolean;

  toChange(): GroupChange {
    if (this.op === 'create') {
      if (this.parentConceptId === undefined || this.childConceptIds === undefined) {
        throw new GraphError(
          'ValidationFailed',
          'parentConceptId and childConceptIds are required to create a group',
        );
      }
      return {
        op: 'create',
        parentConceptId: this.parentConceptId,
        childConceptIds: this.childConceptIds,
        groupName: this.groupName,
      };
    }

    const groupId = this.groupId;
    if (groupId === undefined) {
      throw new GraphError('ValidationFailed', `groupId is required for ${this.op}`);
    }
    switch (this.op) {
      case 'expand':
        return { op: 'expand', groupId, dissolve: this.dissolve ?? false };
      case 'collapse':
        return { op: 'collapse', groupId };
      case 'delete':
        return { op: 'delete', groupId };
      case 'add-member':
      case 'remove-member':
        if (this.conceptId === undefined) {
          throw new GraphError('ValidationFailed', `conceptId is required for ${this.op}`);
        }
        return { op: this.op, groupId, conceptId: this.conceptId };
    }
  }
}
