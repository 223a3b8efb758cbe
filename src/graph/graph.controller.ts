import {
  Body,
  Controller,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  ValidationPipe,
} from '@nestjs/common';
import {
  ApiHeader,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { GraphError } from '../common/errors/graph-error';
import { GraphSnapshot } from '../graph-store/types/graph.types';
import { VisibleGraph } from '../grouping/visible-graph';
import { PresenceInfo } from '../sessions/session.types';
import {
  CanCreateGroupRequestDto,
  CanCreateGroupResponseDto,
} from './dto/graph.dto';
import { GraphService } from './graph.service';

function requireUser(userId: string | undefined): string {
  const trimmed = userId?.trim();
  if (!trimmed) throw GraphError.permissionDenied('Missing x-user-id header');
  return trimmed;
}

@ApiTags('ontologies')
@ApiHeader({ name: 'x-user-id', description: 'Authenticated user id', required: true })
@ApiParam({ name: 'ontologyId', example: 1 })
@Controller('api/ontologies/:ontologyId')
export class GraphController {
  constructor(private readonly graphService: GraphService) {}

  @Get('snapshot')
  @ApiOperation({
    summary: 'Full graph of an ontology',
    description: `
      All concepts, relationships, individuals, individual relationships and
      groups, plus the sequence number of the last commit.
      Real-time clients use the hub's requestSnapshot instead.
    `,
  })
  @ApiResponse({ status: 200, description: 'Snapshot retrieved successfully' })
  @ApiResponse({ status: 403, description: 'No View permission' })
  @ApiResponse({ status: 404, description: 'Ontology not found' })
  async getSnapshot(
    @Headers('x-user-id') userId: string | undefined,
    @Param('ontologyId', ParseIntPipe) ontologyId: number,
  ): Promise<GraphSnapshot> {
    return this.graphService.getSnapshot(requireUser(userId), ontologyId);
  }

  @Get('visible-graph')
  @ApiOperation({
    summary: 'Graph as drawn, with collapsed groups applied',
    description: `
      Hidden children are left out; relationships crossing a collapsed group's
      boundary are rerouted to the group's parent.
    `,
  })
  @ApiResponse({ status: 200, description: 'Visible graph retrieved successfully' })
  async getVisibleGraph(
    @Headers('x-user-id') userId: string | undefined,
    @Param('ontologyId', ParseIntPipe) ontologyId: number,
  ): Promise<VisibleGraph> {
    return this.graphService.getVisibleGraph(requireUser(userId), ontologyId);
  }

  @Post('groups/can-create')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Check whether concepts can be grouped (read-only)' })
  @ApiResponse({ status: 200, type: CanCreateGroupResponseDto })
  async canCreateGroup(
    @Headers('x-user-id') userId: string | undefined,
    @Param('ontologyId', ParseIntPipe) ontologyId: number,
    @Body(new ValidationPipe({ transform: true })) dto: CanCreateGroupRequestDto,
  ): Promise<CanCreateGroupResponseDto> {
    return this.graphService.canCreateGroup(
      requireUser(userId),
      ontologyId,
      dto.parentConceptId,
      dto.childConceptIds,
    );
  }

  @Get('presence')
  @ApiOperation({ summary: 'Collaborators currently joined to the ontology' })
  @ApiResponse({ status: 200, description: 'Presence list, oldest join first' })
  async getPresence(
    @Headers('x-user-id') userId: string | undefined,
    @Param('ontologyId', ParseIntPipe) ontologyId: number,
  ): Promise<PresenceInfo[]> {
    return this.graphService.getPresence(requireUser(userId), ontologyId);
  }
}
