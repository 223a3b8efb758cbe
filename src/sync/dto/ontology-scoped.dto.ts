import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, Min } from 'class-validator';

export class OntologyScopedDto {
  @ApiProperty({ description: 'Target ontology', example: 1 })
  @Type(() => Number)
  @IsInt()
  @Min(1)
  ontologyId!: number;
}
