import type { ClientSource, Queryable } from '../store/pgStore';

const SCHEMA_STATEMENTS = [
  `
    CREATE TABLE IF NOT EXISTS events (
      id SERIAL PRIMARY KEY,
      title TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      date TEXT NOT NULL DEFAULT '',
      location TEXT NOT NULL DEFAULT '',
      created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    );
  `,
  `
    CREATE TABLE IF NOT EXISTS attendees (
      id SERIAL PRIMARY KEY,
      event_id INTEGER NOT NULL REFERENCES events(id),
      name TEXT NOT NULL,
      email TEXT NOT NULL DEFAULT '',
      phone TEXT NOT NULL DEFAULT '',
      rsvp_status TEXT NOT NULL DEFAULT 'Attending',
      checked_in BOOLEAN NOT NULL DEFAULT FALSE,
      created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    );
  `,
  `
    CREATE INDEX IF NOT EXISTS idx_attendees_event_id ON attendees(event_id);
  `,
];

export const createSchema = async (db: Queryable): Promise<void> => {
  for (const statement of SCHEMA_STATEMENTS) {
    await db.query(statement);
  }
};

export const initializeDatabase = async (pool: ClientSource): Promise<void> => {
  const client = await pool.connect();

  try {
    await createSchema(client);
    console.log('Database initialized successfully');
  } catch (error) {
    console.error('Error initializing database:', error);
    throw error;
  } finally {
    client.release();
  }
};
