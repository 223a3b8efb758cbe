import { Socket } from 'socket.io';
import { HubClient, HubEvent } from './types/hub.types';

/**
 * HubClient over a Socket.IO socket. The backlog counts events emitted since
 * the engine last reported its write buffer drained.
 */
export class SocketIoHubClient implements HubClient {
  private pending = 0;

  constructor(private readonly socket: Socket) {
    socket.conn.on('drain', () => {
      this.pending = 0;
    });
  }

  get id(): string {
    return this.socket.id;
  }

  emit(event: HubEvent): void {
    this.pending += 1;
    this.socket.emit(event.type, event);
  }

  backlog(): number {
    return this.pending;
  }
}
