import { body, ValidationChain } from 'express-validator';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const isAmountLike = (value: unknown): boolean => {
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  return typeof value === 'string' && value.trim() !== '';
};

export const requiredDate = (field: string): ValidationChain =>
  body(field)
    .exists({ values: 'null' })
    .withMessage(`${field} is required`)
    .bail()
    .isString()
    .withMessage(`${field} must be a string`)
    .bail()
    .trim()
    .matches(DATE_PATTERN)
    .withMessage(`${field} must use YYYY-MM-DD format`);

export const optionalDate = (field: string): ValidationChain =>
  body(field)
    .optional({ values: 'null' })
    .isString()
    .withMessage(`${field} must be a string`)
    .bail()
    .trim()
    .matches(DATE_PATTERN)
    .withMessage(`${field} must use YYYY-MM-DD format`);

export const requiredAmount = (): ValidationChain =>
  body('amount')
    .exists({ values: 'null' })
    .withMessage('amount is required')
    .bail()
    .custom((value: unknown) => {
      if (!isAmountLike(value)) {
        throw new Error('amount must be a number');
      }
      return true;
    });

export const optionalAmount = (): ValidationChain =>
  body('amount')
    .optional({ values: 'null' })
    .custom((value: unknown) => {
      if (!isAmountLike(value)) {
        throw new Error('amount must be a number');
      }
      return true;
    });

export const requiredText = (field: string): ValidationChain =>
  body(field)
    .exists({ values: 'null' })
    .withMessage(`${field} is required`)
    .bail()
    .isString()
    .withMessage(`${field} must be a string`)
    .bail()
    .trim()
    .notEmpty()
    .withMessage(`${field} must not be empty`);

export const optionalText = (field: string): ValidationChain =>
  body(field).optional({ values: 'null' }).isString().withMessage(`${field} must be a string`);

export const recordId = (): ValidationChain =>
  body('id')
    .exists({ values: 'null' })
    .withMessage('id is required')
    .bail()
    .isInt({ gt: 0 })
    .withMessage('id must be a positive integer')
    .bail()
    .toInt();
