import { StoreHandler } from '../middleware/withStore';

export const initDatabase: StoreHandler = async (_req, res, store) => {
  await store.initializeSchema();
  res.type('text/plain').send('Database initialized successfully');
};
