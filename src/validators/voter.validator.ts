import { body } from 'express-validator';
import { VOTER_ID_MAX_LENGTH } from '../types/vote.types';

export const validateRegisterVoter = [
  body('voterId')
    .isString()
    .withMessage('voterId must be a string')
    .bail()
    .trim()
    .isLength({ min: 1, max: VOTER_ID_MAX_LENGTH })
    .withMessage(`voterId must be between 1 and ${VOTER_ID_MAX_LENGTH} characters`),
];
