import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsInt,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { GraphError } from '../../common/errors/graph-error';
import { RelationshipChange } from '../../graph-store/types/graph.types';
import { EntityChangeDto } from './change.dto';

export class RelationshipFieldsDto {
  @ApiPropertyOptional({ example: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  sourceConceptId?: number;

  @ApiPropertyOptional({ example: 2 })
  @IsOptional()
  @IsInt()
  @Min(1)
  targetConceptId?: number;

  @ApiPropertyOptional({ example: 'is-a' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  relationType?: string;

  @ApiPropertyOptional({ example: 'subclass of' })
  @IsOptional()
  @IsString()
  label?: string | null;
}

export class RelationshipChangeDto extends EntityChangeDto {
  @ApiProperty({ type: RelationshipFieldsDto, required: false })
  @IsOptional()
  @ValidateNested()
  @Type(() => RelationshipFieldsDto)
  fields?: RelationshipFieldsDto;

  toChange(): RelationshipChange {
    switch (this.op) {
      case 'create': {
        const { sourceConceptId, targetConceptId, relationType, label } =
          this.requireFields(this.fields);
        if (sourceConceptId === undefined || targetConceptId === undefined) {
          throw new GraphError(
            'ValidationFailed',
            'sourceConceptId and targetConceptId are required',
          );
        }
        return {
          op: 'create',
          id: this.id,
          fields: { sourceConceptId, targetConceptId, relationType: relationType ?? '', label },
        };
      }
      case 'update':
        return {
          op: 'update',
          id: this.requireId(),
          expectedVersion: this.expectedVersion,
          fields: { ...this.requireFields(this.fields) },
        };
      case 'delete':
        return { op: 'delete', id: this.requireId(), expectedVersion: this.expectedVersion };
    }
  }
}
