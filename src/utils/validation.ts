import { NextFunction, Request, Response } from 'express';
import { body, param, validationResult } from 'express-validator';
import { DEFAULT_RSVP_STATUS, RSVP_STATUSES } from '../types';
import { BadRequestError, NotFoundError } from './errors';
import { FIELD_LIMITS, sanitizeText } from './sanitize';

// Ids are SERIAL columns; anything past INTEGER range cannot exist.
const MAX_ID = 2147483647;

const idParam = (notFoundMessage: string) =>
  param('id').isInt({ min: 1, max: MAX_ID }).withMessage(notFoundMessage).toInt();

const text = (field: keyof typeof FIELD_LIMITS) =>
  body(field).customSanitizer((value: unknown) => sanitizeText(value, FIELD_LIMITS[field]));

export const eventIdValidation = [idParam('Event not found')];

export const attendeeIdValidation = [idParam('Not found')];

export const createEventValidation = [
  text('title').notEmpty().withMessage('Title is required'),
  text('description'),
  text('date'),
  text('location'),
];

// Form fields are checked before the id, so a bad form is a 400 even on a bad path.
export const createRSVPValidation = [
  text('name').notEmpty().withMessage('Name is required'),
  text('email'),
  text('phone'),
  body('status')
    .customSanitizer(
      (value: unknown) => sanitizeText(value, FIELD_LIMITS.status) || DEFAULT_RSVP_STATUS
    )
    .isIn([...RSVP_STATUSES])
    .withMessage('Invalid RSVP status'),
  idParam('Event not found'),
];

/**
 * Stops the request at the first failed check. A bad path id means the
 * resource cannot exist (404); a bad form field is the client's error (400).
 */
export const rejectInvalid = (req: Request, _res: Response, next: NextFunction): void => {
  const [first] = validationResult(req).array({ onlyFirstError: true });

  if (!first) {
    next();
    return;
  }

  const message = String(first.msg);
  if (first.type === 'field' && first.location === 'params') {
    next(new NotFoundError(message));
    return;
  }
  next(new BadRequestError(message));
};
