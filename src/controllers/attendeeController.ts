import { matchedData } from 'express-validator';
import { StoreHandler } from '../middleware/withStore';
import { NotFoundError } from '../utils/errors';

// A toggle, not a set: every call flips the flag.
export const toggleCheckIn: StoreHandler = async (req, res, store) => {
  const { id } = matchedData<{ id: number }>(req, { locations: ['params'] });

  const attendee = await store.toggleCheckIn(id);
  if (!attendee) {
    throw new NotFoundError('Not found');
  }

  res.redirect(`/event/${attendee.event_id}`);
};
