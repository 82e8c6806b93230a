import { Router } from 'express';
import { toggleCheckIn } from '../controllers/attendeeController';
import { withStore } from '../middleware/withStore';
import { StoreProvider } from '../store/eventStore';
import { attendeeIdValidation, rejectInvalid } from '../utils/validation';

export const createAttendeeRoutes = (provider: StoreProvider): Router => {
  const router = Router();

  router.get(
    '/attendee/:id(\\d+)/toggle_checkin',
    attendeeIdValidation,
    rejectInvalid,
    withStore(provider, toggleCheckIn)
  );

  return router;
};
