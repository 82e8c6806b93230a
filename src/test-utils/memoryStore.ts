import { ScopedStore, StoreProvider } from '../store/eventStore';
import { Attendee, CreateEventRequest, CreateRSVPRequest, Event } from '../types';

/**
 * In-process stand-in for the Postgres tables. Every store handed out by
 * `provider` shares the same rows, the way pooled connections share one
 * database, and counts its acquisitions and releases.
 */
export class MemoryDatabase {
  events: Event[] = [];
  attendees: Attendee[] = [];
  schemaInitializations = 0;
  acquired = 0;
  released = 0;

  private nextEventId = 1;
  private nextAttendeeId = 1;

  readonly provider: StoreProvider = async () => this.connect();

  connect(): ScopedStore {
    this.acquired++;
    let released = false;

    return {
      initializeSchema: async () => {
        this.schemaInitializations++;
      },
      listEvents: async () =>
        [...this.events].sort((a, b) => {
          if (a.date !== b.date) return a.date < b.date ? 1 : -1;
          return b.id - a.id;
        }),
      findEvent: async (id) => this.events.find((event) => event.id === id) ?? null,
      createEvent: async (input) => this.insertEvent(input),
      listAttendees: async (eventId) =>
        this.attendees
          .filter((attendee) => attendee.event_id === eventId)
          .sort((a, b) => b.id - a.id),
      createAttendee: async (eventId, input) => this.insertAttendee(eventId, input),
      toggleCheckIn: async (attendeeId) => {
        const attendee = this.attendees.find((row) => row.id === attendeeId);
        if (!attendee) return null;
        attendee.checked_in = !attendee.checked_in;
        return { ...attendee };
      },
      release: () => {
        if (released) return;
        released = true;
        this.released++;
      },
    };
  }

  insertEvent(input: Partial<CreateEventRequest> & { title: string }): Event {
    const event: Event = {
      id: this.nextEventId++,
      title: input.title,
      description: input.description ?? '',
      date: input.date ?? '',
      location: input.location ?? '',
      created_at: new Date(),
    };
    this.events.push(event);
    return { ...event };
  }

  insertAttendee(eventId: number, input: CreateRSVPRequest, checkedIn = false): Attendee {
    const attendee: Attendee = {
      id: this.nextAttendeeId++,
      event_id: eventId,
      name: input.name,
      email: input.email,
      phone: input.phone,
      rsvp_status: input.status,
      checked_in: checkedIn,
      created_at: new Date(),
    };
    this.attendees.push(attendee);
    return { ...attendee };
  }
}
