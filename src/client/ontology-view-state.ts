import {
  Concept,
  ConceptGroup,
  EntityMeta,
  GraphSnapshot,
  Individual,
  IndividualRelationship,
  Relationship,
} from '../graph-store/types/graph.types';
import { projectVisibleGraph, VisibleGraph } from '../grouping/visible-graph';
import { PresenceInfo } from '../sessions/session.types';
import { GraphChangedEvent, HubEvent, HubReply } from '../sync/types/hub.types';

type Table<T> = ReadonlyMap<number, T>;

export interface PendingMutation {
  clientMutationId: string;
  type: GraphChangedEvent['type'];
  proposedAt: Date;
}

interface ViewStateData {
  ontologyId: number;
  sequence: number;
  concepts: Table<Concept>;
  relationships: Table<Relationship>;
  individuals: Table<Individual>;
  individualRelationships: Table<IndividualRelationship>;
  groups: Table<ConceptGroup>;
  presence: ReadonlyMap<string, PresenceInfo>;
  pending: readonly PendingMutation[];
  needsResync: boolean;
  lastError: { clientMutationId: string; code: string; message: string } | null;
}

const toTable = <T extends EntityMeta>(rows: readonly T[]): Table<T> =>
  new Map(rows.map((row) => [row.id, row]));

function upsert<T extends EntityMeta>(table: Table<T>, rows: readonly T[]): Table<T> {
  if (rows.length === 0) return table;
  const next = new Map(table);
  rows.forEach((row) => next.set(row.id, row));
  return next;
}

function remove<T>(table: Table<T>, ids: readonly number[]): Table<T> {
  if (ids.length === 0) return table;
  const next = new Map(table);
  ids.forEach((id) => next.delete(id));
  return next;
}

const sorted = <T extends EntityMeta>(table: Table<T>): T[] =>
  Array.from(table.values()).sort((a, b) => a.id - b.id);

/**
 * What one client knows about an ontology. Immutable: every method returns a
 * new state. Graph tables change only through server events or reconciled
 * replies; proposals stay in `pending` until their reply arrives.
 */
export class OntologyViewState {
  private constructor(private readonly data: ViewStateData) {}

  static fromSnapshot(
    snapshot: GraphSnapshot,
    presence: readonly PresenceInfo[] = [],
  ): OntologyViewState {
    return new OntologyViewState({
      ontologyId: snapshot.ontologyId,
      sequence: snapshot.sequence,
      concepts: toTable(snapshot.concepts),
      relationships: toTable(snapshot.relationships),
      individuals: toTable(snapshot.individuals),
      individualRelationships: toTable(snapshot.individualRelationships),
      groups: toTable(snapshot.groups),
      presence: new Map(presence.map((p) => [p.connectionId, p])),
      pending: [],
      needsResync: false,
      lastError: null,
    });
  }

  get ontologyId(): number {
    return this.data.ontologyId;
  }

  get sequence(): number {
    return this.data.sequence;
  }

  get needsResync(): boolean {
    return this.data.needsResync;
  }

  get pending(): readonly PendingMutation[] {
    return this.data.pending;
  }

  get lastError(): ViewStateData['lastError'] {
    return this.data.lastError;
  }

  get presence(): PresenceInfo[] {
    return Array.from(this.data.presence.values());
  }

  concept(id: number): Concept | undefined {
    return this.data.concepts.get(id);
  }

  relationship(id: number): Relationship | undefined {
    return this.data.relationships.get(id);
  }

  group(id: number): ConceptGroup | undefined {
    return this.data.groups.get(id);
  }

  snapshot(): GraphSnapshot {
    return {
      ontologyId: this.data.ontologyId,
      sequence: this.data.sequence,
      concepts: sorted(this.data.concepts),
      relationships: sorted(this.data.relationships),
      individuals: sorted(this.data.individuals),
      individualRelationships: sorted(this.data.individualRelationships),
      groups: sorted(this.data.groups),
    };
  }

  visibleGraph(): VisibleGraph {
    return projectVisibleGraph(this.snapshot());
  }

  // ============================================
  // TRANSITIONS
  // ============================================

  propose(pending: PendingMutation): OntologyViewState {
    return this.with({ pending: [...this.data.pending, pending], lastError: null });
  }

  /** Settles a proposal with the server's reply to it. */
  reconcile(
    clientMutationId: string,
    reply: HubReply<GraphChangedEvent>,
  ): OntologyViewState {
    const settled = this.with({
      pending: this.data.pending.filter((p) => p.clientMutationId !== clientMutationId),
    });
    if (!reply.ok) {
      return settled.with({ lastError: { clientMutationId, ...reply.error } });
    }
    return settled.apply(reply.data);
  }

  apply(event: HubEvent): OntologyViewState {
    if (event.ontologyId !== this.data.ontologyId) return this;

    switch (event.type) {
      case 'UserJoined':
      case 'UserViewChanged':
      case 'UserLeft':
      case 'PresenceList':
        return this.applyPresence(event);
      case 'ResyncRequired':
        return this.with({ needsResync: true });
      default:
        return this.applyCommit(event);
    }
  }

  private applyCommit(event: GraphChangedEvent): OntologyViewState {
    // Already seen, e.g. through our own reply
    if (event.sequence <= this.data.sequence) return this;
    const gap = event.sequence > this.data.sequence + 1;
    const next = this.applyGraphChange(event);
    return next.with({
      sequence: event.sequence,
      needsResync: this.data.needsResync || gap,
    });
  }

  private applyGraphChange(event: GraphChangedEvent): OntologyViewState {
    const d = this.data;
    switch (event.type) {
      case 'ConceptChanged': {
        const { changeType, concept, cascade } = event.commit;
        if (changeType !== 'deleted') {
          return this.with({ concepts: upsert(d.concepts, [concept]) });
        }
        return this.with({
          concepts: remove(d.concepts, [concept.id]),
          relationships: remove(d.relationships, cascade?.deletedRelationshipIds ?? []),
          individuals: remove(d.individuals, cascade?.deletedIndividualIds ?? []),
          individualRelationships: remove(
            d.individualRelationships,
            cascade?.deletedIndividualRelationshipIds ?? [],
          ),
          groups: upsert(
            remove(d.groups, cascade?.deletedGroupIds ?? []),
            cascade?.updatedGroups ?? [],
          ),
        });
      }
      case 'RelationshipChanged': {
        const { changeType, relationship, updatedGroups } = event.commit;
        return this.with({
          relationships:
            changeType === 'deleted'
              ? remove(d.relationships, [relationship.id])
              : upsert(d.relationships, [relationship]),
          groups: upsert(d.groups, updatedGroups),
        });
      }
      case 'IndividualChanged': {
        const { changeType, individual, deletedIndividualRelationshipIds } = event.commit;
        return this.with({
          individuals:
            changeType === 'deleted'
              ? remove(d.individuals, [individual.id])
              : upsert(d.individuals, [individual]),
          individualRelationships: remove(
            d.individualRelationships,
            deletedIndividualRelationshipIds,
          ),
        });
      }
      case 'IndividualRelationshipChanged': {
        const { changeType, individualRelationship } = event.commit;
        return this.with({
          individualRelationships:
            changeType === 'deleted'
              ? remove(d.individualRelationships, [individualRelationship.id])
              : upsert(d.individualRelationships, [individualRelationship]),
        });
      }
      case 'GroupChanged': {
        const { changeType, group, movedConcepts } = event.commit;
        return this.with({
          groups:
            changeType === 'deleted'
              ? remove(d.groups, [group.id])
              : upsert(d.groups, [group]),
          concepts: upsert(d.concepts, movedConcepts),
        });
      }
    }
  }

  private applyPresence(
    event: Extract<
      HubEvent,
      { type: 'UserJoined' | 'UserLeft' | 'UserViewChanged' | 'PresenceList' }
    >,
  ): OntologyViewState {
    const presence = new Map(this.data.presence);
    switch (event.type) {
      case 'PresenceList':
        return this.with({
          presence: new Map(event.users.map((u) => [u.connectionId, u])),
        });
      case 'UserJoined':
        presence.set(event.user.connectionId, event.user);
        break;
      case 'UserLeft':
        presence.delete(event.connectionId);
        break;
      case 'UserViewChanged': {
        const current = presence.get(event.connectionId);
        if (!current) return this;
        presence.set(event.connectionId, { ...current, currentView: event.currentView });
        break;
      }
    }
    return this.with({ presence });
  }

  private with(patch: Partial<ViewStateData>): OntologyViewState {
    return new OntologyViewState({ ...this.data, ...patch });
  }
}
