import { AccountId, LedgerEvent, LedgerResult, LedgerSnapshot, Ticket } from '../models/ledger';

interface LedgerState {
  events: Map<number, LedgerEvent>;
  tickets: Map<number, Ticket>;
  nextEventId: number;
  nextTicketId: number;
  totalPlatformRevenue: number;
}

interface StagedChanges {
  events: LedgerEvent[];
  tickets: Ticket[];
  nextEventId: number;
  nextTicketId: number;
  totalPlatformRevenue: number;
}

/**
 * Write set of a single ledger operation. Reads see the staged writes; nothing
 * reaches the store until the owning `LedgerStore.transaction` commits.
 */
export class LedgerTransaction {
  private readonly stagedEvents = new Map<number, LedgerEvent>();
  private readonly stagedTickets = new Map<number, Ticket>();
  private nextEventId: number;
  private nextTicketId: number;
  private totalPlatformRevenue: number;

  constructor(private readonly state: Readonly<LedgerState>) {
    this.nextEventId = state.nextEventId;
    this.nextTicketId = state.nextTicketId;
    this.totalPlatformRevenue = state.totalPlatformRevenue;
  }

  getEvent(eventId: number): Readonly<LedgerEvent> | undefined {
    return this.stagedEvents.get(eventId) ?? this.state.events.get(eventId);
  }

  getTicket(ticketId: number): Readonly<Ticket> | undefined {
    return this.stagedTickets.get(ticketId) ?? this.state.tickets.get(ticketId);
  }

  allocateEventId(): number {
    const eventId = this.nextEventId;
    this.nextEventId += 1;
    return eventId;
  }

  /**
   * Reserve `count` consecutive ticket ids and return the first one.
   */
  allocateTicketIds(count: number): number {
    const firstTicketId = this.nextTicketId;
    this.nextTicketId += count;
    return firstTicketId;
  }

  putEvent(event: LedgerEvent): void {
    this.stagedEvents.set(event.id, { ...event });
  }

  putTicket(ticket: Ticket): void {
    this.stagedTickets.set(ticket.id, { ...ticket });
  }

  addPlatformRevenue(amount: number): void {
    this.totalPlatformRevenue += amount;
  }

  changes(): StagedChanges {
    return {
      events: [...this.stagedEvents.values()],
      tickets: [...this.stagedTickets.values()],
      nextEventId: this.nextEventId,
      nextTicketId: this.nextTicketId,
      totalPlatformRevenue: this.totalPlatformRevenue,
    };
  }
}

export class LedgerStore {
  private readonly state: LedgerState = {
    events: new Map(),
    tickets: new Map(),
    nextEventId: 1,
    nextTicketId: 1,
    totalPlatformRevenue: 0,
  };

  getEvent(eventId: number): LedgerEvent | undefined {
    const event = this.state.events.get(eventId);
    return event ? { ...event } : undefined;
  }

  getTicket(ticketId: number): Ticket | undefined {
    const ticket = this.state.tickets.get(ticketId);
    return ticket ? { ...ticket } : undefined;
  }

  listTicketsByOwner(owner: AccountId): Ticket[] {
    return [...this.state.tickets.values()]
      .filter((ticket) => ticket.owner === owner)
      .map((ticket) => ({ ...ticket }));
  }

  get nextEventId(): number {
    return this.state.nextEventId;
  }

  get nextTicketId(): number {
    return this.state.nextTicketId;
  }

  get totalPlatformRevenue(): number {
    return this.state.totalPlatformRevenue;
  }

  get eventCount(): number {
    return this.state.events.size;
  }

  get ticketCount(): number {
    return this.state.tickets.size;
  }

  /**
   * Run `callback` against a fresh write set and apply it only if the callback
   * returns a successful result. A failed result or a thrown error discards
   * every staged write.
   */
  transaction<T>(callback: (tx: LedgerTransaction) => LedgerResult<T>): LedgerResult<T> {
    const tx = new LedgerTransaction(this.state);
    const result = callback(tx);

    if (result.ok) {
      this.apply(tx.changes());
    }

    return result;
  }

  snapshot(): LedgerSnapshot {
    return {
      events: [...this.state.events.values()]
        .sort((a, b) => a.id - b.id)
        .map((event) => ({ ...event })),
      tickets: [...this.state.tickets.values()]
        .sort((a, b) => a.id - b.id)
        .map((ticket) => ({ ...ticket })),
      nextEventId: this.state.nextEventId,
      nextTicketId: this.state.nextTicketId,
      totalPlatformRevenue: this.state.totalPlatformRevenue,
    };
  }

  private apply(changes: StagedChanges): void {
    for (const event of changes.events) {
      this.state.events.set(event.id, event);
    }
    for (const ticket of changes.tickets) {
      this.state.tickets.set(ticket.id, ticket);
    }
    this.state.nextEventId = changes.nextEventId;
    this.state.nextTicketId = changes.nextTicketId;
    this.state.totalPlatformRevenue = changes.totalPlatformRevenue;
  }
}
