import { Attendee, CreateEventRequest, CreateRSVPRequest, Event } from '../types';

/**
 * Reads and writes over the events and attendees tables.
 */
export interface EventStore {
  /** Creates both tables if they do not exist yet. */
  initializeSchema(): Promise<void>;

  /** Every event, `date` descending by plain string comparison, then newest id first. */
  listEvents(): Promise<Event[]>;

  findEvent(id: number): Promise<Event | null>;

  createEvent(input: CreateEventRequest): Promise<Event>;

  /** Attendees of one event, newest first. */
  listAttendees(eventId: number): Promise<Attendee[]>;

  createAttendee(eventId: number, input: CreateRSVPRequest): Promise<Attendee>;

  /**
   * Flips the checked-in flag of one attendee and returns the updated row,
   * or `null` when no attendee has that id.
   */
  toggleCheckIn(attendeeId: number): Promise<Attendee | null>;
}

/** A store bound to one connection, which must be released exactly once. */
export interface ScopedStore extends EventStore {
  release(): void;
}

export type StoreProvider = () => Promise<ScopedStore>;
