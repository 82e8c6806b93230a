import { matchedData } from 'express-validator';
import { StoreHandler } from '../middleware/withStore';
import { attendeesToCSV, csvFilename } from '../utils/csv';
import { NotFoundError } from '../utils/errors';

export const exportEventCSV: StoreHandler = async (req, res, store) => {
  const { id } = matchedData<{ id: number }>(req, { locations: ['params'] });

  const event = await store.findEvent(id);
  if (!event) {
    throw new NotFoundError('Event not found');
  }

  const attendees = await store.listAttendees(id);

  res.attachment(csvFilename(id));
  res.type('text/csv');
  res.send(attendeesToCSV(attendees));
};
