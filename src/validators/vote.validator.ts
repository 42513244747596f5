import { body } from 'express-validator';

// ============================================================================
// VOTING VALIDATORS
// ============================================================================

// Type checks only. Values (secret, event, candidates) are checked by the
// service, in its order, so an unknown secret fails before an unknown event.
export const validateSubmitVote = [
  body('voterSecret')
    .isString()
    .withMessage('voterSecret must be a string'),

  body('eventId')
    .isString()
    .withMessage('eventId must be a string'),

  body('selectedCandidateIds')
    .isArray()
    .withMessage('selectedCandidateIds must be an array'),
];

// ============================================================================
// VERIFICATION VALIDATORS
// ============================================================================

export const validateDecodeVote = [
  body('level')
    .isInt({ min: 1, max: 2 })
    .withMessage('level must be 1 or 2')
    .toInt(),

  body('verificationCode')
    .isString()
    .withMessage('verificationCode must be a string')
    .bail()
    .trim()
    .notEmpty()
    .withMessage('verificationCode is required'),

  body('voteSecret')
    .optional()
    .isString()
    .withMessage('voteSecret must be a string'),
];
