import { Logger } from '@nestjs/common';
import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  SubscribeMessage,
  WebSocketGateway,
} from '@nestjs/websockets';
import { Socket } from 'socket.io';
import { isGraphError } from '../common/errors/graph-error';
import { parsePayload } from '../common/utils/parse-payload';
import {
  Committed,
  ConceptCommit,
  GraphSnapshot,
  GroupCommit,
  IndividualCommit,
  IndividualRelationshipCommit,
  RelationshipCommit,
} from '../graph-store/types/graph.types';
import { PresenceInfo } from '../sessions/session.types';
import {
  CanCreateGroupDto,
  ConceptChangeDto,
  GroupChangeDto,
  IndividualChangeDto,
  IndividualRelationshipChangeDto,
  OntologyScopedDto,
  RelationshipChangeDto,
  UpdateViewDto,
} from './dto';
import { SocketIoHubClient } from './socket-io-hub-client';
import { SyncHubService } from './sync-hub.service';
import { HubReply } from './types/hub.types';

/** User id from the handshake's `auth` payload, trimmed; null when absent. */
export function readUserId(auth: unknown): string | null {
  if (typeof auth !== 'object' || auth === null || !('userId' in auth)) {
    return null;
  }
  const userId = auth.userId;
  return typeof userId === 'string' && userId.trim() ? userId.trim() : null;
}

/** Runs a handler and folds its outcome into a reply. */
export async function settle<T>(
  work: () => Promise<T>,
  onUnexpected: (error: unknown) => void,
): Promise<HubReply<T>> {
  try {
    return { ok: true, data: await work() };
  } catch (error) {
    if (isGraphError(error)) {
      return { ok: false, error: error.toJSON() };
    }
    onUnexpected(error);
    return { ok: false, error: { code: 'InternalError', message: 'Internal error' } };
  }
}

/**
 * Socket.IO surface of the hub. Every message is acknowledged with a
 * HubReply; errors never escape as exceptions.
 */
@WebSocketGateway({ namespace: '/ontology', cors: { origin: '*' } })
export class OntologyGateway implements OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(OntologyGateway.name);
  // Handshakes still resolving the user; messages wait for them
  private readonly connecting = new Map<string, Promise<boolean>>();

  constructor(private readonly hub: SyncHubService) {}

  handleConnection(socket: Socket): void {
    const userId = readUserId(socket.handshake.auth);
    if (!userId) {
      this.logger.warn(`Rejecting ${socket.id}: no userId in handshake`);
      socket.disconnect(true);
      return;
    }

    const ready = this.hub.connect(new SocketIoHubClient(socket), userId).then(
      () => true,
      (error: unknown) => {
        this.logger.warn(`Rejecting ${socket.id}: ${errorMessage(error)}`);
        socket.disconnect(true);
        return false;
      },
    );
    this.connecting.set(socket.id, ready);
    void ready.then(() => this.connecting.delete(socket.id));
  }

  async handleDisconnect(socket: Socket): Promise<void> {
    await this.connecting.get(socket.id);
    await this.hub.disconnect(socket.id);
  }

  @SubscribeMessage('joinOntology')
  joinOntology(
    @ConnectedSocket() socket: Socket,
    @MessageBody() body: unknown,
  ): Promise<HubReply<PresenceInfo[]>> {
    return this.reply(socket, async () => {
      const { ontologyId } = await parsePayload(OntologyScopedDto, body);
      return this.hub.joinOntology(socket.id, ontologyId);
    });
  }

  @SubscribeMessage('leaveOntology')
  leaveOntology(
    @ConnectedSocket() socket: Socket,
    @MessageBody() body: unknown,
  ): Promise<HubReply<null>> {
    return this.reply(socket, async () => {
      const { ontologyId } = await parsePayload(OntologyScopedDto, body);
      await this.hub.leaveOntology(socket.id, ontologyId);
      return null;
    });
  }

  // ============================================
  // PROPOSED CHANGES
  // ============================================

  @SubscribeMessage('proposeConceptChange')
  proposeConceptChange(
    @ConnectedSocket() socket: Socket,
    @MessageBody() body: unknown,
  ): Promise<HubReply<Committed<ConceptCommit>>> {
    return this.reply(socket, async () => {
      const dto = await parsePayload(ConceptChangeDto, body);
      return this.hub.proposeConceptChange(socket.id, dto.ontologyId, dto.toChange());
    });
  }

  @SubscribeMessage('proposeRelationshipChange')
  proposeRelationshipChange(
    @ConnectedSocket() socket: Socket,
    @MessageBody() body: unknown,
  ): Promise<HubReply<Committed<RelationshipCommit>>> {
    return this.reply(socket, async () => {
      const dto = await parsePayload(RelationshipChangeDto, body);
      return this.hub.proposeRelationshipChange(socket.id, dto.ontologyId, dto.toChange());
    });
  }

  @SubscribeMessage('proposeIndividualChange')
  proposeIndividualChange(
    @ConnectedSocket() socket: Socket,
    @MessageBody() body: unknown,
  ): Promise<HubReply<Committed<IndividualCommit>>> {
    return this.reply(socket, async () => {
      const dto = await parsePayload(IndividualChangeDto, body);
      return this.hub.proposeIndividualChange(socket.id, dto.ontologyId, dto.toChange());
    });
  }

  @SubscribeMessage('proposeIndividualRelationshipChange')
  proposeIndividualRelationshipChange(
    @ConnectedSocket() socket: Socket,
    @MessageBody() body: unknown,
  ): Promise<HubReply<Committed<IndividualRelationshipCommit>>> {
    return this.reply(socket, async () => {
      const dto = await parsePayload(IndividualRelationshipChangeDto, body);
      return this.hub.proposeIndividualRelationshipChange(
        socket.id,
        dto.ontologyId,
        dto.toChange(),
      );
    });
  }

  @SubscribeMessage('proposeGroupChange')
  proposeGroupChange(
    @ConnectedSocket() socket: Socket,
    @MessageBody() body: unknown,
  ): Promise<HubReply<Committed<GroupCommit>>> {
    return this.reply(socket, async () => {
      const dto = await parsePayload(GroupChangeDto, body);
      return this.hub.proposeGroupChange(socket.id, dto.ontologyId, dto.toChange());
    });
  }

  // ============================================
  // READS & PRESENCE
  // ============================================

  @SubscribeMessage('canCreateGroup')
  canCreateGroup(
    @ConnectedSocket() socket: Socket,
    @MessageBody() body: unknown,
  ): Promise<HubReply<boolean>> {
    return this.reply(socket, async () => {
      const dto = await parsePayload(CanCreateGroupDto, body);
      return this.hub.canCreateGroup(
        socket.id,
        dto.ontologyId,
        dto.parentConceptId,
        dto.childConceptIds,
      );
    });
  }

  @SubscribeMessage('heartbeat')
  heartbeat(
    @ConnectedSocket() socket: Socket,
    @MessageBody() body: unknown,
  ): Promise<HubReply<{ serverTime: Date }>> {
    return this.reply(socket, async () => {
      const { ontologyId } = await parsePayload(OntologyScopedDto, body);
      return this.hub.heartbeat(socket.id, ontologyId);
    });
  }

  @SubscribeMessage('updateCurrentView')
  updateCurrentView(
    @ConnectedSocket() socket: Socket,
    @MessageBody() body: unknown,
  ): Promise<HubReply<boolean>> {
    return this.reply(socket, async () => {
      const dto = await parsePayload(UpdateViewDto, body);
      return this.hub.updateCurrentView(socket.id, dto.ontologyId, dto.viewName);
    });
  }

  @SubscribeMessage('requestSnapshot')
  requestSnapshot(
    @ConnectedSocket() socket: Socket,
    @MessageBody() body: unknown,
  ): Promise<HubReply<GraphSnapshot>> {
    return this.reply(socket, async () => {
      const { ontologyId } = await parsePayload(OntologyScopedDto, body);
      return this.hub.snapshot(socket.id, ontologyId);
    });
  }

  private async reply<T>(socket: Socket, work: () => Promise<T>): Promise<HubReply<T>> {
    const connected = await (this.connecting.get(socket.id) ?? true);
    if (!connected) {
      return { ok: false, error: { code: 'PermissionDenied', message: 'Not connected' } };
    }
    return settle(work, (error) =>
      this.logger.error(
        `Unexpected failure handling message from ${socket.id}`,
        error instanceof Error ? error.stack : String(error),
      ),
    );
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
