import { Router } from 'express';
import {
  createEvent,
  createRSVP,
  getEvent,
  listEvents,
  newEventForm,
} from '../controllers/eventController';
import { withStore } from '../middleware/withStore';
import { StoreProvider } from '../store/eventStore';
import {
  createEventValidation,
  createRSVPValidation,
  eventIdValidation,
  rejectInvalid,
} from '../utils/validation';

export const createEventRoutes = (provider: StoreProvider): Router => {
  const router = Router();

  router.get('/', withStore(provider, listEvents));

  router.get('/event/new', newEventForm);
  router.post('/event/new', createEventValidation, rejectInvalid, withStore(provider, createEvent));

  // Only digit ids match; anything else falls through to the 404 handler.
  router.get('/event/:id(\\d+)', eventIdValidation, rejectInvalid, withStore(provider, getEvent));
  router.post(
    '/event/:id(\\d+)/rsvp',
    createRSVPValidation,
    rejectInvalid,
    withStore(provider, createRSVP)
  );

  return router;
};
