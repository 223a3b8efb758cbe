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
import {
  IndividualChange,
  IndividualRelationshipChange,
} from '../../graph-store/types/graph.types';
import { EntityChangeDto } from './change.dto';

export class IndividualFieldsDto {
  @ApiPropertyOptional({ example: 3 })
  @IsOptional()
  @IsInt()
  @Min(1)
  conceptTypeId?: number;

  @ApiPropertyOptional({ example: 'Rex' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  name?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  label?: string | null;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string | null;
}

export class IndividualChangeDto extends EntityChangeDto {
  @ApiProperty({ type: IndividualFieldsDto, required: false })
  @IsOptional()
  @ValidateNested()
  @Type(() => IndividualFieldsDto)
  fields?: IndividualFieldsDto;

  toChange(): IndividualChange {
    switch (this.op) {
      case 'create': {
        const { conceptTypeId, name, label, description } = this.requireFields(
          this.fields,
        );
        if (conceptTypeId === undefined) {
          throw new GraphError('ValidationFailed', 'conceptTypeId is required');
        }
        return {
          op: 'create',
          id: this.id,
          fields: { conceptTypeId, name: name ?? '', label, description },
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

export class IndividualRelationshipFieldsDto {
  @ApiPropertyOptional({ example: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  sourceIndividualId?: number;

  @ApiPropertyOptional({ example: 2 })
  @IsOptional()
  @IsInt()
  @Min(1)
  targetIndividualId?: number;

  @ApiPropertyOptional({ example: 'knows' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  relationType?: string;
}

export class IndividualRelationshipChangeDto extends EntityChangeDto {
  @ApiProperty({ type: IndividualRelationshipFieldsDto, required: false })
  @IsOptional()
  @ValidateNested()
  @Type(() => IndividualRelationshipFieldsDto)
  fields?: IndividualRelationshipFieldsDto;

  toChange(): IndividualRelationshipChange {
    switch (this.op) {
      case 'create': {
        const { sourceIndividualId, targetIndividualId, relationType } =
          this.requireFields(this.fields);
        if (sourceIndividualId === undefined || targetIndividualId === undefined) {
          throw new GraphError(
            'ValidationFailed',
            'sourceIndividualId and targetIndividualId are required',
          );
        }
        return {
          op: 'create',
          id: this.id,
          fields: {
            sourceIndividualId,
            targetIndividualId,
            relationType: relationType ?? '',
          },
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
