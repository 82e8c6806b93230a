import { QueryResult, QueryResultRow } from 'pg';
import { createSchema } from '../config/init-db';
import { Attendee, CreateEventRequest, CreateRSVPRequest, Event } from '../types';
import { ScopedStore, StoreProvider } from './eventStore';

/** The part of a `pg` client or pool the store talks to. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>>;
}

export interface PooledClient extends Queryable {
  release(error?: Error | boolean): void;
}

/** Where clients come from; a `pg` `Pool` in production. */
export interface ClientSource {
  connect(): Promise<PooledClient>;
}

const EVENT_COLUMNS = 'id, title, description, date, location, created_at';
const ATTENDEE_COLUMNS =
  'id, event_id, name, email, phone, rsvp_status, checked_in, created_at';

const toEvent = (row: QueryResultRow): Event => ({
  id: row.id,
  title: row.title,
  description: row.description ?? '',
  date: row.date ?? '',
  location: row.location ?? '',
  created_at: row.created_at,
});

const toAttendee = (row: QueryResultRow): Attendee => ({
  id: row.id,
  event_id: row.event_id,
  name: row.name,
  email: row.email ?? '',
  phone: row.phone ?? '',
  rsvp_status: row.rsvp_status,
  checked_in: Boolean(row.checked_in),
  created_at: row.created_at,
});

export class PgEventStore implements ScopedStore {
  constructor(
    private readonly db: Queryable,
    private readonly onRelease: () => void = () => undefined
  ) {}

  async initializeSchema(): Promise<void> {
    await createSchema(this.db);
  }

  async listEvents(): Promise<Event[]> {
    // COLLATE "C" keeps the ordering a plain byte comparison of the free-text
    // date, whatever collation the database was created with.
    const result = await this.db.query(
      `SELECT ${EVENT_COLUMNS} FROM events ORDER BY date COLLATE "C" DESC, id DESC`
    );
    return result.rows.map(toEvent);
  }

  async findEvent(id: number): Promise<Event | null> {
    const result = await this.db.query(
      `SELECT ${EVENT_COLUMNS} FROM events WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? toEvent(result.rows[0]) : null;
  }

  async createEvent(input: CreateEventRequest): Promise<Event> {
    const result = await this.db.query(
      `INSERT INTO events (title, description, date, location) VALUES ($1, $2, $3, $4) RETURNING ${EVENT_COLUMNS}`,
      [input.title, input.description, input.date, input.location]
    );
    return toEvent(result.rows[0]);
  }

  async listAttendees(eventId: number): Promise<Attendee[]> {
    const result = await this.db.query(
      `SELECT ${ATTENDEE_COLUMNS} FROM attendees WHERE event_id = $1 ORDER BY created_at DESC, id DESC`,
      [eventId]
    );
    return result.rows.map(toAttendee);
  }

  async createAttendee(eventId: number, input: CreateRSVPRequest): Promise<Attendee> {
    const result = await this.db.query(
      `INSERT INTO attendees (event_id, name, email, phone, rsvp_status) VALUES ($1, $2, $3, $4, $5) RETURNING ${ATTENDEE_COLUMNS}`,
      [eventId, input.name, input.email, input.phone, input.status]
    );
    return toAttendee(result.rows[0]);
  }

  async toggleCheckIn(attendeeId: number): Promise<Attendee | null> {
    const result = await this.db.query(
      `UPDATE attendees SET checked_in = NOT checked_in WHERE id = $1 RETURNING ${ATTENDEE_COLUMNS}`,
      [attendeeId]
    );
    return result.rows.length > 0 ? toAttendee(result.rows[0]) : null;
  }

  release(): void {
    this.onRelease();
  }
}

/**
 * Checks one client out of the pool per call. The returned store hands the
 * client back on `release()`; later calls are ignored.
 */
export const createPgStoreProvider = (pool: ClientSource): StoreProvider => async () => {
  const client = await pool.connect();
  let released = false;

  return new PgEventStore(client, () => {
    if (released) return;
    released = true;
    client.release();
  });
};
