import { body, param, query } from 'express-validator';
import { CANDIDATE_NAME_MAX_LENGTH, EVENT_NAME_MAX_LENGTH, MIN_CANDIDATES } from '../types/event.types';

// ============================================================================
// EVENT VALIDATORS
// ============================================================================

export const validateCreateEvent = [
  body('name')
    .isString()
    .withMessage('Event name must be a string')
    .bail()
    .trim()
    .isLength({ min: 1, max: EVENT_NAME_MAX_LENGTH })
    .withMessage(`Event name must be between 1 and ${EVENT_NAME_MAX_LENGTH} characters`),

  body('opensAt')
    .isISO8601()
    .withMessage('opensAt must be an ISO 8601 date'),

  body('closesAt')
    .isISO8601()
    .withMessage('closesAt must be an ISO 8601 date')
    .bail()
    .custom((value: string, { req }) => {
      const opensAt: unknown = req.body?.opensAt;
      return typeof opensAt !== 'string' || Date.parse(opensAt) < Date.parse(value);
    })
    .withMessage('closesAt must be after opensAt'),

  body('selectionLimit')
    .isInt({ min: 1 })
    .withMessage('selectionLimit must be a positive integer')
    .toInt(),

  body('candidateNames')
    .isArray({ min: MIN_CANDIDATES })
    .withMessage(`At least ${MIN_CANDIDATES} candidate names are required`),

  body('candidateNames.*')
    .isString()
    .withMessage('Candidate names must be strings')
    .bail()
    .trim()
    .isLength({ min: 1, max: CANDIDATE_NAME_MAX_LENGTH })
    .withMessage(`Candidate names must be between 1 and ${CANDIDATE_NAME_MAX_LENGTH} characters`),
];

export const validateEventId = [
  param('eventId')
    .isUUID()
    .withMessage('Invalid event ID format'),
];

export const validateListEvents = [
  query('page')
    .optional()
    .isInt({ min: 1 })
    .withMessage('page must be a positive integer')
    .toInt(),

  query('limit')
    .optional()
    .isInt({ min: 1, max: 100 })
    .withMessage('limit must be between 1 and 100')
    .toInt(),
];
