import { ApiProperty } from '@nestjs/swagger';
import { IsString } from 'class-validator';
import { OntologyScopedDto } from './ontology-scoped.dto';

export class UpdateViewDto extends OntologyScopedDto {
  // Length rules live in the hub: bad names are ignored, not rejected
  @ApiProperty({ example: 'Graph' })
  @IsString()
  viewName!: string;
}
