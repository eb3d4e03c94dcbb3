import { body } from 'express-validator';

import { LedgerEntryInput } from '../ledger/ledger.types';

export const DESCRIPTION_MAX_LENGTH = 10;

export const isPositiveInteger = (value: unknown): value is number => {
  return typeof value === 'number' && Number.isSafeInteger(value) && value > 0;
};

/**
 * Length in code points, so 'café' is 4 and an emoji counts once
 */
export const descriptionLength = (value: string): number => [...value].length;

export const isValidDescription = (value: unknown): value is string => {
  if (typeof value !== 'string') return false;
  const length = descriptionLength(value);
  return length >= 1 && length <= DESCRIPTION_MAX_LENGTH;
};

/**
 * Input rules of the transaction processor, checked in order.
 * Returns per-field messages; an empty object means the entry is valid.
 */
export const validateLedgerEntry = (entry: LedgerEntryInput): Record<string, string[]> => {
  const errors: Record<string, string[]> = {};

  if (!isPositiveInteger(entry.amount)) {
    errors.amount = ['Amount must be a positive integer number of cents'];
  }
  if (entry.kind !== 'credit' && entry.kind !== 'debit') {
    errors.kind = ["Kind must be 'credit' or 'debit'"];
  }
  if (!isValidDescription(entry.description)) {
    errors.description = [`Description must be 1 to ${DESCRIPTION_MAX_LENGTH} characters`];
  }

  return errors;
};

/**
 * Wire-level checks for POST /clients/:id/transactions.
 * Strings are not coerced: "100" is not a valid value.
 */
export const createTransactionValidation = [
  body('value')
    .exists({ values: 'null' })
    .withMessage('Value is required')
    .bail()
    .custom((value: unknown) => isPositiveInteger(value))
    .withMessage('Value must be a positive integer'),
  body('type')
    .exists({ values: 'null' })
    .withMessage('Type is required')
    .bail()
    .custom((value: unknown) => value === 'c' || value === 'd')
    .withMessage("Type must be 'c' or 'd'"),
  body('description')
    .exists({ values: 'null' })
    .withMessage('Description is required')
    .bail()
    .custom((value: unknown) => isValidDescription(value))
    .withMessage(`Description must be a string of 1 to ${DESCRIPTION_MAX_LENGTH} characters`),
];
