import { Pool } from 'pg';
import { config } from './index';

const pool = new Pool({
  connectionString: config.databaseUrl,
  max: config.pool.max,
  idleTimeoutMillis: config.pool.idleTimeoutMillis,
});

// An idle client losing its connection must not take the process down.
pool.on('error', (error) => {
  console.error('Unexpected error on idle database client:', error);
});

export default pool;
