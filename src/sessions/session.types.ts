export type ConnectionState = 'connecting' | 'joined' | 'viewing' | 'disconnected';

export interface SessionUser {
  userId: string;
  displayName: string;
  email: string | null;
}

export interface SessionEntry extends SessionUser {
  connectionId: string;
  state: ConnectionState;
  color: string;
  ontologyId: number | null;
  currentView: string | null;
  joinedAt: Date | null;
  lastSeenAt: Date;
}

/** What other collaborators see of a joined connection. */
export interface PresenceInfo extends SessionUser {
  connectionId: string;
  color: string;
  currentView: string | null;
  joinedAt: Date;
  lastSeenAt: Date;
}
