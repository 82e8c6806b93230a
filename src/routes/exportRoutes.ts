import { Router } from 'express';
import { exportEventCSV } from '../controllers/exportController';
import { withStore } from '../middleware/withStore';
import { StoreProvider } from '../store/eventStore';
import { eventIdValidation, rejectInvalid } from '../utils/validation';

export const createExportRoutes = (provider: StoreProvider): Router => {
  const router = Router();

  router.get(
    '/export/event/:id(\\d+)/csv',
    eventIdValidation,
    rejectInvalid,
    withStore(provider, exportEventCSV)
  );

  return router;
};
