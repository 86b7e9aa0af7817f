import { query } from 'express-validator';
import { handleValidation } from '../handleValidation';

export const validateWikiSearch = [
  query('query').isString().trim().notEmpty().isLength({ max: 300 }),
  query('lang').optional().isString().matches(/^[a-z]{2,3}(-[a-z0-9]+)*$/i),
  query('limit').optional().isInt({ min: 1, max: 50 }),
  handleValidation,
];
