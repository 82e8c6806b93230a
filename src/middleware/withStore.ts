import { NextFunction, Request, RequestHandler, Response } from 'express';
import { EventStore, ScopedStore, StoreProvider } from '../store/eventStore';

export type StoreHandler = (req: Request, res: Response, store: EventStore) => Promise<void>;

/**
 * Runs `handler` on a connection of its own. The connection is released
 * once the handler settles, whether it responded, threw or rejected.
 */
export const withStore =
  (provider: StoreProvider, handler: StoreHandler): RequestHandler =>
  async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    let store: ScopedStore;
    try {
      store = await provider();
    } catch (error) {
      next(error);
      return;
    }

    try {
      await handler(req, res, store);
    } catch (error) {
      next(error);
    } finally {
      store.release();
    }
  };
