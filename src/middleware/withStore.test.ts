import express from 'express';
import request from 'supertest';
import { MemoryDatabase } from '../test-utils/memoryStore';
import { NotFoundError } from '../utils/errors';
import { errorHandler } from './errorHandler';
import { withStore } from './withStore';

describe('withStore', () => {
  let database: MemoryDatabase;

  beforeEach(() => {
    database = new MemoryDatabase();
  });

  const mount = (app: express.Express) => {
    app.use(errorHandler);
    return app;
  };

  it('should release the connection after a successful response', async () => {
    const app = express();
    app.get(
      '/count',
      withStore(database.provider, async (_req, res, store) => {
        const events = await store.listEvents();
        res.json({ count: events.length });
      })
    );

    const res = await request(mount(app)).get('/count');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ count: 0 });
    expect(database.acquired).toBe(1);
    expect(database.released).toBe(1);
  });

  it('should release the connection when the handler throws an HTTP error', async () => {
    const app = express();
    app.get(
      '/missing',
      withStore(database.provider, async () => {
        throw new NotFoundError('Event not found');
      })
    );

    const res = await request(mount(app)).get('/missing');

    expect(res.status).toBe(404);
    expect(res.text).toBe('Event not found');
    expect(database.released).toBe(1);
  });

  it('should release the connection when the handler fails unexpectedly', async () => {
    const consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const app = express();
    app.get(
      '/broken',
      withStore(database.provider, async () => {
        throw new Error('connection reset');
      })
    );

    const res = await request(mount(app)).get('/broken');

    expect(res.status).toBe(500);
    expect(res.text).toBe('Internal Server Error');
    expect(database.released).toBe(1);
    consoleSpy.mockRestore();
  });

  it('should answer 500 without running the handler when no connection is available', async () => {
    const consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const handler = jest.fn(async () => undefined);
    const app = express();
    app.get(
      '/unavailable',
      withStore(async () => {
        throw new Error('too many clients');
      }, handler)
    );

    const res = await request(mount(app)).get('/unavailable');

    expect(res.status).toBe(500);
    expect(handler).not.toHaveBeenCalled();
    consoleSpy.mockRestore();
  });
});
