import { Request, Response } from 'express';
import { matchedData } from 'express-validator';
import { StoreHandler } from '../middleware/withStore';
import { CreateEventRequest, CreateRSVPRequest, RSVP_STATUSES } from '../types';
import { NotFoundError } from '../utils/errors';

interface EventParams {
  id: number;
}

export const listEvents: StoreHandler = async (_req, res, store) => {
  const events = await store.listEvents();
  res.render('index', { events });
};

export const newEventForm = (_req: Request, res: Response): void => {
  res.render('new-event');
};

export const createEvent: StoreHandler = async (req, res, store) => {
  const { title, description, date, location } = matchedData<CreateEventRequest>(req, {
    locations: ['body'],
  });

  await store.createEvent({ title, description, date, location });
  res.redirect('/');
};

export const getEvent: StoreHandler = async (req, res, store) => {
  const { id } = matchedData<EventParams>(req, { locations: ['params'] });

  const event = await store.findEvent(id);
  if (!event) {
    throw new NotFoundError('Event not found');
  }

  const attendees = await store.listAttendees(id);
  const checkedInCount = attendees.filter((attendee) => attendee.checked_in).length;

  res.render('event', { event, attendees, checkedInCount, statuses: RSVP_STATUSES });
};

export const createRSVP: StoreHandler = async (req, res, store) => {
  const { id, name, email, phone, status } = matchedData<EventParams & CreateRSVPRequest>(req);

  // The event must exist at insert time; nothing checks it afterwards.
  const event = await store.findEvent(id);
  if (!event) {
    throw new NotFoundError('Event not found');
  }

  await store.createAttendee(id, { name, email, phone, status });
  res.redirect(`/event/${id}`);
};
