import { Injectable } from '@nestjs/common';
import { GraphStoreService } from '../graph-store/graph-store.service';
import { GraphSnapshot } from '../graph-store/types/graph.types';
import { VisibleGraph } from '../grouping/visible-graph';
import { PermissionGateService } from '../permissions/permission-gate.service';
import { OntologyAction } from '../permissions/permission.types';
import { PresenceInfo } from '../sessions/session.types';
import { SyncHubService } from '../sync/sync-hub.service';
import { CanCreateGroupResponseDto } from './dto/graph.dto';

/** Read-only HTTP access to an ontology; every call needs View. */
@Injectable()
export class GraphService {
  constructor(
    private readonly store: GraphStoreService,
    private readonly gate: PermissionGateService,
    private readonly hub: SyncHubService,
  ) {}

  async getSnapshot(userId: string, ontologyId: number): Promise<GraphSnapshot> {
    await this.gate.assertAllowed(userId, ontologyId, OntologyAction.View);
    return this.store.snapshot(ontologyId);
  }

  async getVisibleGraph(userId: string, ontologyId: number): Promise<VisibleGraph> {
    await this.gate.assertAllowed(userId, ontologyId, OntologyAction.View);
    return this.store.visibleGraph(ontologyId);
  }

  async canCreateGroup(
    userId: string,
    ontologyId: number,
    parentConceptId: number,
    childConceptIds: number[],
  ): Promise<CanCreateGroupResponseDto> {
    await this.gate.assertAllowed(userId, ontologyId, OntologyAction.View);
    const result = await this.store.validateGroup(
      ontologyId,
      parentConceptId,
      childConceptIds,
    );
    return result.ok
      ? { allowed: true }
      : { allowed: false, code: result.code, reason: result.message };
  }

  async getPresence(userId: string, ontologyId: number): Promise<PresenceInfo[]> {
    await this.gate.assertAllowed(userId, ontologyId, OntologyAction.View);
    return this.hub.presence(ontologyId);
  }
}
