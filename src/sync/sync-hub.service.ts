import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Subscription } from 'rxjs';
import { CLOCK, Clock } from '../common/clock';
import { GraphError } from '../common/errors/graph-error';
import { syncConfig } from '../config/sync.config';
import { GraphStoreService } from '../graph-store/graph-store.service';
import {
  CommitOrigin,
  Committed,
  ConceptChange,
  ConceptCommit,
  GraphCommitEvent,
  GraphSnapshot,
  GroupChange,
  GroupCommit,
  IndividualChange,
  IndividualCommit,
  IndividualRelationshipChange,
  IndividualRelationshipCommit,
  RelationshipChange,
  RelationshipCommit,
} from '../graph-store/types/graph.types';
import { PermissionGateService } from '../permissions/permission-gate.service';
import {
  actionForChange,
  GROUP_ACTION,
  OntologyAction,
} from '../permissions/permission.types';
import { PresenceMirrorService } from '../sessions/presence-mirror.service';
import {
  SessionRegistryService,
  toPresence,
} from '../sessions/session-registry.service';
import { PresenceInfo, SessionEntry } from '../sessions/session.types';
import { ConnectionOutbox } from './connection-outbox';
import { GraphChangedEvent, HubClient, HubEvent } from './types/hub.types';

export const MAX_VIEW_NAME_LENGTH = 50;

function toHubEvent(event: GraphCommitEvent): GraphChangedEvent {
  const { ontologyId, sequence, committedAt, origin } = event;
  const envelope = { ontologyId, sequence, committedAt, origin };
  switch (event.kind) {
    case 'concept':
      return { type: 'ConceptChanged', ...envelope, commit: event.commit };
    case 'relationship':
      return { type: 'RelationshipChanged', ...envelope, commit: event.commit };
    case 'individual':
      return { type: 'IndividualChanged', ...envelope, commit: event.commit };
    case 'individual-relationship':
      return {
        type: 'IndividualRelationshipChanged',
        ...envelope,
        commit: event.commit,
      };
    case 'group':
      return { type: 'GroupChanged', ...envelope, commit: event.commit };
  }
}

/**
 * Real-time fan-out for ontology collaboration.
 *
 * Connections join one ontology at a time. Proposed changes are checked
 * against the permission gate and committed through the graph store; the
 * store's commit stream is relayed to every other subscriber of the ontology
 * in commit order. Presence (join, leave, view, heartbeat) lives in the
 * session registry.
 */
@Injectable()
export class SyncHubService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SyncHubService.name);
  private readonly outboxes = new Map<string, ConnectionOutbox>();
  private readonly subscribers = new Map<number, Set<string>>();
  private commitSubscription: Subscription | null = null;

  constructor(
    private readonly store: GraphStoreService,
    private readonly gate: PermissionGateService,
    private readonly registry: SessionRegistryService,
    private readonly mirror: PresenceMirrorService,
    @Inject(syncConfig.KEY)
    private readonly config: ConfigType<typeof syncConfig>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  onModuleInit(): void {
    this.commitSubscription = this.store.commits$.subscribe((event) =>
      this.broadcast(
        event.ontologyId,
        toHubEvent(event),
        event.origin.connectionId,
      ),
    );
  }

  onModuleDestroy(): void {
    this.commitSubscription?.unsubscribe();
    this.commitSubscription = null;
  }

  // ============================================
  // CONNECTION LIFECYCLE
  // ============================================

  async connect(client: HubClient, userId: string): Promise<SessionEntry> {
    const user = await this.gate.identify(userId);
    if (!user) throw GraphError.permissionDenied(`Unknown user ${userId}`);

    this.outboxes.set(
      client.id,
      new ConnectionOutbox(client, this.config.outboxCapacity, this.logger),
    );
    const entry = this.registry.register(
      client.id,
      { userId: user.id, displayName: user.displayName, email: user.email },
      this.clock(),
    );
    this.logger.log(`🔌 ${user.id} connected as ${client.id}`);
    return entry;
  }

  async disconnect(connectionId: string): Promise<void> {
    const entry = this.registry.get(connectionId);
    const left = entry ? this.depart(entry, 'disconnected') : null;
    this.unsubscribe(connectionId);
    this.registry.remove(connectionId);
    this.outboxes.delete(connectionId);
    if (left !== null) await this.mirror.remove(left, connectionId);
    if (entry) this.logger.log(`🔌 ${entry.userId} disconnected (${connectionId})`);
  }

  async joinOntology(
    connectionId: string,
    ontologyId: number,
  ): Promise<PresenceInfo[]> {
    const { userId } = this.registry.require(connectionId);
    await this.gate.assertAllowed(userId, ontologyId, OntologyAction.View);

    // Re-read: another join or a leave may have landed during the check.
    // Everything up to the mirror writes runs without yielding.
    const session = this.registry.require(connectionId);
    if (session.ontologyId === ontologyId) {
      return this.registry.listByOntology(ontologyId);
    }
    const left = this.depart(session, 'left');

    const joined = this.registry.join(connectionId, ontologyId, this.clock());
    this.subscribersOf(ontologyId).add(connectionId);

    const users = this.registry.listByOntology(ontologyId);
    const presence = toPresence(joined);
    if (presence) {
      this.broadcast(ontologyId, { type: 'UserJoined', ontologyId, user: presence }, connectionId);
    }
    this.sendTo(connectionId, { type: 'PresenceList', ontologyId, users });

    if (left !== null) await this.mirror.remove(left, connectionId);
    if (presence) await this.mirror.publish(ontologyId, presence);

    this.logger.log(`👥 ${session.userId} joined ontology ${ontologyId} (${users.length} online)`);
    return users;
  }

  async leaveOntology(connectionId: string, ontologyId: number): Promise<void> {
    const session = this.registry.require(connectionId);
    if (session.ontologyId !== ontologyId) return;
    await this.leave(session, 'left');
  }

  // ============================================
  // PROPOSED CHANGES
  // ============================================

  proposeConceptChange(
    connectionId: string,
    ontologyId: number,
    change: ConceptChange,
  ): Promise<Committed<ConceptCommit>> {
    return this.propose(connectionId, ontologyId, actionForChange(change.op), (origin) =>
      this.store.applyConceptChange(ontologyId, change, origin),
    );
  }

  proposeRelationshipChange(
    connectionId: string,
    ontologyId: number,
    change: RelationshipChange,
  ): Promise<Committed<RelationshipCommit>> {
    return this.propose(connectionId, ontologyId, actionForChange(change.op), (origin) =>
      this.store.applyRelationshipChange(ontologyId, change, origin),
    );
  }

  proposeIndividualChange(
    connectionId: string,
    ontologyId: number,
    change: IndividualChange,
  ): Promise<Committed<IndividualCommit>> {
    return this.propose(connectionId, ontologyId, actionForChange(change.op), (origin) =>
      this.store.applyIndividualChange(ontologyId, change, origin),
    );
  }

  proposeIndividualRelationshipChange(
    connectionId: string,
    ontologyId: number,
    change: IndividualRelationshipChange,
  ): Promise<Committed<IndividualRelationshipCommit>> {
    return this.propose(connectionId, ontologyId, actionForChange(change.op), (origin) =>
      this.store.applyIndividualRelationshipChange(ontologyId, change, origin),
    );
  }

  proposeGroupChange(
    connectionId: string,
    ontologyId: number,
    change: GroupChange,
  ): Promise<Committed<GroupCommit>> {
    return this.propose(connectionId, ontologyId, GROUP_ACTION, (origin) =>
      this.store.applyGroupChange(ontologyId, change, origin),
    );
  }

  // ============================================
  // READS, HEARTBEAT & VIEW
  // ============================================

  async canCreateGroup(
    connectionId: string,
    ontologyId: number,
    parentConceptId: number,
    childConceptIds: number[],
  ): Promise<boolean> {
    const session = this.registry.require(connectionId);
    await this.gate.assertAllowed(session.userId, ontologyId, OntologyAction.View);
    return this.store.canCreateGroup(ontologyId, parentConceptId, childConceptIds);
  }

  async snapshot(connectionId: string, ontologyId: number): Promise<GraphSnapshot> {
    const session = this.requireJoined(connectionId, ontologyId);
    await this.gate.assertAllowed(session.userId, ontologyId, OntologyAction.View);
    const snapshot = await this.store.snapshot(ontologyId);
    this.outboxes.get(connectionId)?.clearResync();
    return snapshot;
  }

  async heartbeat(
    connectionId: string,
    ontologyId: number,
  ): Promise<{ serverTime: Date }> {
    this.requireJoined(connectionId, ontologyId);
    const now = this.clock();
    await this.markActive(connectionId, ontologyId, now);
    return { serverTime: now };
  }

  /** Returns false when the view name is rejected; nothing is broadcast then. */
  async updateCurrentView(
    connectionId: string,
    ontologyId: number,
    viewName: string,
  ): Promise<boolean> {
    const session = this.requireJoined(connectionId, ontologyId);
    const view = viewName.trim();
    if (view.length === 0 || view.length > MAX_VIEW_NAME_LENGTH) {
      this.logger.warn(
        `Ignoring view name of length ${view.length} from ${session.userId}`,
      );
      return false;
    }

    const updated = this.registry.setView(connectionId, view, this.clock());
    const presence = toPresence(updated);
    if (presence) await this.mirror.publish(ontologyId, presence);
    this.broadcast(
      ontologyId,
      {
        type: 'UserViewChanged',
        ontologyId,
        connectionId,
        userId: session.userId,
        currentView: view,
      },
      connectionId,
    );
    return true;
  }

  /**
   * Presence across instances when mirrored, else this instance's. Local
   * sessions are always included, even if their mirror entry expired.
   */
  async presence(ontologyId: number): Promise<PresenceInfo[]> {
    const local = this.registry.listByOntology(ontologyId);
    const mirrored = await this.mirror.list(ontologyId);
    if (!mirrored) return local;

    const byConnection = new Map(mirrored.map((p) => [p.connectionId, p]));
    local.forEach((p) => byConnection.set(p.connectionId, p));
    return Array.from(byConnection.values()).sort(
      (a, b) =>
        a.joinedAt.getTime() - b.joinedAt.getTime() ||
        a.connectionId.localeCompare(b.connectionId),
    );
  }

  /** Drops joined sessions that stopped sending heartbeats. */
  async evictStale(): Promise<PresenceInfo[]> {
    const cutoff = new Date(this.clock().getTime() - this.config.presenceTimeoutMs);
    const evicted: PresenceInfo[] = [];

    for (const stale of this.registry.findStale(cutoff)) {
      // Earlier evictions yield; the connection may have moved on since
      const entry = this.registry.get(stale.connectionId);
      if (!entry || entry.ontologyId !== stale.ontologyId || entry.lastSeenAt >= cutoff) {
        continue;
      }
      const presence = toPresence(entry);
      if (presence) evicted.push(presence);
      this.logger.warn(
        `⏱️ Evicting ${entry.userId} (${entry.connectionId}) from ontology ${entry.ontologyId}, last seen ${entry.lastSeenAt.toISOString()}`,
      );
      await this.leave(entry, 'timeout');
    }
    return evicted;
  }

  /** Unloads graphs nobody on this instance is subscribed to. */
  async releaseIdleOntologies(): Promise<number[]> {
    const released: number[] = [];
    for (const ontologyId of this.store.loadedOntologyIds()) {
      if (this.subscribers.has(ontologyId)) continue;
      if (await this.store.unload(ontologyId)) released.push(ontologyId);
    }
    return released;
  }

  // ============================================
  // INTERNALS
  // ============================================

  private async propose<T>(
    connectionId: string,
    ontologyId: number,
    action: OntologyAction,
    run: (origin: CommitOrigin) => Promise<T>,
  ): Promise<T> {
    const { userId } = this.requireJoined(connectionId, ontologyId);
    await this.gate.assertAllowed(userId, ontologyId, action);
    // The connection may have left or switched ontology during the check
    this.requireJoined(connectionId, ontologyId);
    const [committed] = await Promise.all([
      run({ userId, connectionId }),
      this.markActive(connectionId, ontologyId, this.clock()),
    ]);
    return committed;
  }

  private async markActive(connectionId: string, ontologyId: number, now: Date): Promise<void> {
    this.registry.touch(connectionId, now);
    const presence = toPresence(this.registry.require(connectionId));
    if (presence) await this.mirror.publish(ontologyId, presence);
  }

  private requireJoined(connectionId: string, ontologyId: number): SessionEntry {
    const session = this.registry.require(connectionId);
    if (session.ontologyId !== ontologyId) {
      throw GraphError.permissionDenied(
        `Connection ${connectionId} has not joined ontology ${ontologyId}`,
      );
    }
    return session;
  }

  private async leave(
    session: SessionEntry,
    reason: 'left' | 'disconnected' | 'timeout',
  ): Promise<void> {
    const ontologyId = this.depart(session, reason);
    if (ontologyId !== null) {
      await this.mirror.remove(ontologyId, session.connectionId);
    }
  }

  /** Local half of leaving; returns the ontology left, if any. */
  private depart(
    session: SessionEntry,
    reason: 'left' | 'disconnected' | 'timeout',
  ): number | null {
    const ontologyId = session.ontologyId;
    if (ontologyId === null) return null;

    this.unsubscribe(session.connectionId);
    this.registry.leave(session.connectionId);

    this.broadcast(
      ontologyId,
      {
        type: 'UserLeft',
        ontologyId,
        connectionId: session.connectionId,
        userId: session.userId,
        reason,
      },
      session.connectionId,
    );
    return ontologyId;
  }

  private unsubscribe(connectionId: string): void {
    for (const [ontologyId, set] of this.subscribers) {
      set.delete(connectionId);
      if (set.size === 0) this.subscribers.delete(ontologyId);
    }
  }

  private subscribersOf(ontologyId: number): Set<string> {
    let set = this.subscribers.get(ontologyId);
    if (!set) {
      set = new Set();
      this.subscribers.set(ontologyId, set);
    }
    return set;
  }

  private sendTo(connectionId: string, event: HubEvent): void {
    this.outboxes.get(connectionId)?.deliver(event);
  }

  private broadcast(
    ontologyId: number,
    event: HubEvent,
    exceptConnectionId: string | null,
  ): void {
    for (const connectionId of this.subscribers.get(ontologyId) ?? []) {
      if (connectionId === exceptConnectionId) continue;
      this.sendTo(connectionId, event);
    }
  }
}
