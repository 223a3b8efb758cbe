import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import { ConceptChange } from '../../graph-store/types/graph.types';
import { EntityChangeDto } from './change.dto';

export class ConceptFieldsDto {
  @ApiPropertyOptional({ example: 'Mammal' })
  @IsOptional()
  @IsString()
  @MaxLength(255)
  name?: string;

  @ApiPropertyOptional({ example: 'Animal' })
  @IsOptional()
  @IsString()
  category?: string | null;

  @ApiPropertyOptional({ example: '#4363d8' })
  @IsOptional()
  @IsString()
  @MaxLength(32)
  color?: string | null;

  @ApiPropertyOptional({ example: 'Warm-blooded vertebrate' })
  @IsOptional()
  @IsString()
  definition?: string | null;

  @ApiPropertyOptional({ example: 120 })
  @IsOptional()
  @IsNumber()
  positionX?: number | null;

  @ApiPropertyOptional({ example: -40 })
  @IsOptional()
  @IsNumber()
  positionY?: number | null;
}

export class ConceptChangeDto extends EntityChangeDto {
  @ApiProperty({ type: ConceptFieldsDto, required: false })
  @IsOptional()
  @ValidateNested()
  @Type(() => ConceptFieldsDto)
  fields?: ConceptFieldsDto;

  toChange(): ConceptChange {
    switch (this.op) {
      case 'create': {
        const fields = this.requireFields(this.fields);
        return { op: 'create', id: this.id, fields: { ...fields, name: fields.name ?? '' } };
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
