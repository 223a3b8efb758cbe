import {
  chainSnapshot,
  concept,
  group,
} from '../graph-store/testing/graph-fixtures';
import { Committed, ConceptCommit } from '../graph-store/types/graph.types';
import { PresenceInfo } from '../sessions/session.types';
import { GraphChangedEvent, HubEvent, mapReply } from '../sync/types/hub.types';
import { OntologyViewState } from './ontology-view-state';

const AT = new Date('2024-07-01T08:00:00.000Z');
const origin = { userId: 'user-2', connectionId: 'c2' };

function renamed(sequence: number, name: string, version: number): Committed<ConceptCommit> {
  return {
    ontologyId: 1,
    sequence,
    committedAt: AT,
    origin,
    commit: {
      changeType: 'updated',
      concept: concept(1, 2, { name, version }),
      cascade: null,
    },
  };
}

const asEvent = (committed: Committed<ConceptCommit>): GraphChangedEvent => ({
  type: 'ConceptChanged',
  ...committed,
});

const presence = (connectionId: string): PresenceInfo => ({
  connectionId,
  userId: `user-${connectionId}`,
  displayName: connectionId,
  email: null,
  color: '#e6194b',
  currentView: null,
  joinedAt: AT,
  lastSeenAt: AT,
});

describe('OntologyViewState', () => {
  let state: OntologyViewState;

  beforeEach(() => {
    state = OntologyViewState.fromSnapshot(chainSnapshot(1));
  });

  it('applies a broadcast change without touching the previous state', () => {
    const next = state.apply(asEvent(renamed(1, 'B2', 2)));

    expect(next.concept(2)).toMatchObject({ name: 'B2', version: 2 });
    expect(next.sequence).toBe(1);
    expect(state.concept(2)?.name).toBe('B');
  });

  it('ignores a commit it has already applied', () => {
    const once = state.apply(asEvent(renamed(1, 'B2', 2)));

    expect(once.apply(asEvent(renamed(1, 'B2', 2)))).toBe(once);
  });

  it('asks for a resync after a gap in sequence numbers', () => {
    const next = state.apply(asEvent(renamed(3, 'B3', 3)));

    expect(next.needsResync).toBe(true);
    expect(next.sequence).toBe(3);
  });

  it('removes everything a concept delete cascaded to', () => {
    const next = state.apply({
      type: 'ConceptChanged',
      ontologyId: 1,
      sequence: 1,
      committedAt: AT,
      origin,
      commit: {
        changeType: 'deleted',
        concept: concept(1, 2),
        cascade: {
          deletedRelationshipIds: [1, 2],
          deletedIndividualIds: [],
          deletedIndividualRelationshipIds: [],
          updatedGroups: [],
          deletedGroupIds: [],
        },
      },
    });

    expect(next.snapshot()).toMatchObject({
      sequence: 1,
      concepts: [{ id: 1 }, { id: 3 }],
      relationships: [],
    });
  });

  it('derives the visible graph from applied group changes', () => {
    const next = state.apply({
      type: 'GroupChanged',
      ontologyId: 1,
      sequence: 1,
      committedAt: AT,
      origin,
      commit: {
        changeType: 'added',
        action: 'create',
        group: group(1, 1, 1, [2], { isCollapsed: true }),
        expansion: null,
        movedConcepts: [],
      },
    });

    expect(next.group(1)?.isCollapsed).toBe(true);
    expect(next.visibleGraph().concepts.map((c) => c.id)).toEqual([1, 3]);
  });

  it('keeps proposals pending until the reply settles them', () => {
    const proposed = state.propose({
      clientMutationId: 'm1',
      type: 'ConceptChanged',
      proposedAt: AT,
    });
    expect(proposed.pending).toHaveLength(1);
    expect(proposed.concept(2)?.name).toBe('B');

    const settled = proposed.reconcile(
      'm1',
      mapReply({ ok: true, data: renamed(1, 'Mine', 2) }, asEvent),
    );

    expect(settled.pending).toEqual([]);
    expect(settled.concept(2)?.name).toBe('Mine');
  });

  it('records a rejected proposal and leaves the graph alone', () => {
    const settled = state
      .propose({ clientMutationId: 'm2', type: 'ConceptChanged', proposedAt: AT })
      .reconcile('m2', { ok: false, error: { code: 'StaleState', message: 'old version' } });

    expect(settled.pending).toEqual([]);
    expect(settled.lastError).toEqual({
      clientMutationId: 'm2',
      code: 'StaleState',
      message: 'old version',
    });
    expect(settled.snapshot()).toEqual(state.snapshot());
  });

  it('tracks presence events', () => {
    const events: HubEvent[] = [
      { type: 'PresenceList', ontologyId: 1, users: [presence('a')] },
      { type: 'UserJoined', ontologyId: 1, user: presence('b') },
      {
        type: 'UserViewChanged',
        ontologyId: 1,
        connectionId: 'a',
        userId: 'user-a',
        currentView: 'Tree',
      },
      { type: 'UserLeft', ontologyId: 1, connectionId: 'b', userId: 'user-b', reason: 'left' },
    ];

    const next = events.reduce((s, e) => s.apply(e), state);

    expect(next.presence).toEqual([{ ...presence('a'), currentView: 'Tree' }]);
  });

  it('flags a resync when the server dropped messages', () => {
    expect(
      state.apply({ type: 'ResyncRequired', ontologyId: 1, droppedMessages: 4 }).needsResync,
    ).toBe(true);
  });

  it('ignores events for other ontologies', () => {
    expect(state.apply({ type: 'PresenceList', ontologyId: 2, users: [] })).toBe(state);
  });
});
