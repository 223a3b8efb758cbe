import { HubClient, HubEvent } from '../types/hub.types';

/** Records what the hub sends; `pendingBacklog` simulates a slow socket. */
export class FakeHubClient implements HubClient {
  readonly received: HubEvent[] = [];
  pendingBacklog = 0;

  constructor(readonly id: string) {}

  emit(event: HubEvent): void {
    this.received.push(event);
  }

  backlog(): number {
    return this.pendingBacklog;
  }

  clear(): void {
    this.received.length = 0;
  }

  types(): string[] {
    return this.received.map((e) => e.type);
  }
}
