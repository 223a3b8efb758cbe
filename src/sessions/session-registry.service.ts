import { Injectable } from '@nestjs/common';
import { GraphError } from '../common/errors/graph-error';
import { PresenceInfo, SessionEntry, SessionUser } from './session.types';

export const PRESENCE_COLORS = [
  '#e6194b',
  '#3cb44b',
  '#4363d8',
  '#f58231',
  '#911eb4',
  '#42d4f4',
  '#f032e6',
  '#bfef45',
  '#469990',
  '#9a6324',
  '#800000',
  '#808000',
  '#000075',
  '#a9a9a9',
  '#dcbeff',
] as const;

export function colorForUser(userId: string): string {
  let hash = 0;
  for (const char of userId) {
    hash = (hash * 31 + char.charCodeAt(0)) | 0;
  }
  return PRESENCE_COLORS[Math.abs(hash) % PRESENCE_COLORS.length];
}

/**
 * Process-local map of connection id to session.
 * Returned entries are copies; mutate through the methods.
 */
@Injectable()
export class SessionRegistryService {
  private readonly sessions = new Map<string, SessionEntry>();

  register(connectionId: string, user: SessionUser, now: Date): SessionEntry {
    const entry: SessionEntry = {
      ...user,
      connectionId,
      state: 'connecting',
      color: colorForUser(user.userId),
      ontologyId: null,
      currentView: null,
      joinedAt: null,
      lastSeenAt: now,
    };
    this.sessions.set(connectionId, entry);
    return { ...entry };
  }

  get(connectionId: string): SessionEntry | undefined {
    const entry = this.sessions.get(connectionId);
    return entry ? { ...entry } : undefined;
  }

  require(connectionId: string): SessionEntry {
    const entry = this.get(connectionId);
    if (!entry) throw GraphError.notFound('Connection', connectionId);
    return entry;
  }

  join(connectionId: string, ontologyId: number, now: Date): SessionEntry {
    return this.update(connectionId, {
      state: 'joined',
      ontologyId,
      currentView: null,
      joinedAt: now,
      lastSeenAt: now,
    });
  }

  leave(connectionId: string): SessionEntry {
    return this.update(connectionId, {
      state: 'connecting',
      ontologyId: null,
      currentView: null,
      joinedAt: null,
    });
  }

  setView(connectionId: string, view: string, now: Date): SessionEntry {
    return this.update(connectionId, {
      state: 'viewing',
      currentView: view,
      lastSeenAt: now,
    });
  }

  touch(connectionId: string, now: Date): void {
    const entry = this.sessions.get(connectionId);
    if (entry) entry.lastSeenAt = now;
  }

  remove(connectionId: string): SessionEntry | undefined {
    const entry = this.sessions.get(connectionId);
    if (!entry) return undefined;
    this.sessions.delete(connectionId);
    return { ...entry, state: 'disconnected' };
  }

  /** Joined sessions of an ontology, oldest join first. */
  listByOntology(ontologyId: number): PresenceInfo[] {
    return Array.from(this.sessions.values())
      .flatMap((entry) => {
        const presence = toPresence(entry);
        return presence && entry.ontologyId === ontologyId ? [presence] : [];
      })
      .sort(
        (a, b) =>
          a.joinedAt.getTime() - b.joinedAt.getTime() ||
          a.connectionId.localeCompare(b.connectionId),
      );
  }

  /** Joined sessions last seen before `cutoff`. */
  findStale(cutoff: Date): SessionEntry[] {
    return Array.from(this.sessions.values())
      .filter((e) => e.ontologyId !== null && e.lastSeenAt < cutoff)
      .map((e) => ({ ...e }));
  }

  get size(): number {
    return this.sessions.size;
  }

  private update(connectionId: string, patch: Partial<SessionEntry>): SessionEntry {
    const entry = this.sessions.get(connectionId);
    if (!entry) throw GraphError.notFound('Connection', connectionId);
    Object.assign(entry, patch);
    return { ...entry };
  }
}

export function toPresence(entry: SessionEntry): PresenceInfo | null {
  if (entry.joinedAt === null) return null;
  return {
    connectionId: entry.connectionId,
    userId: entry.userId,
    displayName: entry.displayName,
    email: entry.email,
    color: entry.color,
    currentView: entry.currentView,
    joinedAt: entry.joinedAt,
    lastSeenAt: entry.lastSeenAt,
  };
}
