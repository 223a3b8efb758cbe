import { GraphErrorCode } from '../../common/errors/graph-error';
import {
  Committed,
  ConceptCommit,
  GroupCommit,
  IndividualCommit,
  IndividualRelationshipCommit,
  RelationshipCommit,
} from '../../graph-store/types/graph.types';
import { PresenceInfo } from '../../sessions/session.types';

export type HubEvent =
  | ({ type: 'ConceptChanged' } & Committed<ConceptCommit>)
  | ({ type: 'RelationshipChanged' } & Committed<RelationshipCommit>)
  | ({ type: 'IndividualChanged' } & Committed<IndividualCommit>)
  | ({
      type: 'IndividualRelationshipChanged';
    } & Committed<IndividualRelationshipCommit>)
  | ({ type: 'GroupChanged' } & Committed<GroupCommit>)
  | { type: 'UserJoined'; ontologyId: number; user: PresenceInfo }
  | {
      type: 'UserLeft';
      ontologyId: number;
      connectionId: string;
      userId: string;
      reason: 'left' | 'disconnected' | 'timeout';
    }
  | {
      type: 'UserViewChanged';
      ontologyId: number;
      connectionId: string;
      userId: string;
      currentView: string;
    }
  | { type: 'PresenceList'; ontologyId: number; users: PresenceInfo[] }
  | { type: 'ResyncRequired'; ontologyId: number; droppedMessages: number };

export type HubEventType = HubEvent['type'];

export type GraphChangedEvent = Extract<HubEvent, { committedAt: Date }>;

/** One transport connection as the hub sees it. */
export interface HubClient {
  readonly id: string;
  emit(event: HubEvent): void;
  // Messages handed to the transport and not yet flushed
  backlog(): number;
}

export type HubReply<T> =
  | { ok: true; data: T }
  | { ok: false; error: { code: GraphErrorCode | 'InternalError'; message: string } };

export function mapReply<T, U>(reply: HubReply<T>, fn: (data: T) => U): HubReply<U> {
  return reply.ok ? { ok: true, data: fn(reply.data) } : reply;
}
