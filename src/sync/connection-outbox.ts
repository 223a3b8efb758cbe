import { Logger } from '@nestjs/common';
import { HubClient, HubEvent } from './types/hub.types';

/**
 * Bounded delivery to one connection. A message that finds the transport
 * backlog at capacity is dropped; the next delivered message is preceded by
 * ResyncRequired so the client knows to fetch a snapshot.
 */
export class ConnectionOutbox {
  private droppedSinceResync = 0;
  private totalDropped = 0;

  constructor(
    readonly client: HubClient,
    private readonly capacity: number,
    private readonly logger: Logger,
  ) {}

  get id(): string {
    return this.client.id;
  }

  get needsResync(): boolean {
    return this.droppedSinceResync > 0;
  }

  get dropped(): number {
    return this.totalDropped;
  }

  deliver(event: HubEvent): boolean {
    if (this.client.backlog() >= this.capacity) {
      if (this.droppedSinceResync === 0) {
        this.logger.warn(
          `Outbox of ${this.client.id} is full (${this.capacity}), dropping ${event.type} and flagging for resync`,
        );
      }
      this.droppedSinceResync += 1;
      this.totalDropped += 1;
      return false;
    }

    if (this.droppedSinceResync > 0) {
      this.client.emit({
        type: 'ResyncRequired',
        ontologyId: event.ontologyId,
        droppedMessages: this.droppedSinceResync,
      });
      this.droppedSinceResync = 0;
    }
    this.client.emit(event);
    return true;
  }

  /** A fresh snapshot makes pending drops irrelevant. */
  clearResync(): void {
    this.droppedSinceResync = 0;
  }
}
