import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsArray, IsInt, Min } from 'class-validator';
import { GraphErrorCode } from '../../common/errors/graph-error';

export class CanCreateGroupRequestDto {
  @ApiProperty({ description: 'Concept that will anchor the group', example: 1 })
  @IsInt()
  @Min(1)
  parentConceptId!: number;

  @ApiProperty({
    description: 'Concepts to collapse under the parent',
    type: [Number],
    example: [2, 3],
  })
  @IsArray()
  @IsInt({ each: true })
  childConceptIds!: number[];
}

export class CanCreateGroupResponseDto {
  @ApiProperty({ example: false })
  allowed!: boolean;

  @ApiPropertyOptional({
    description: 'First rule the grouping would break',
    example: 'AlreadyGrouped',
  })
  code?: GraphErrorCode;

  @ApiPropertyOptional({ example: 'Concept 2 already belongs to group 1' })
  reason?: string;
}
