// src/validators/index.ts
// Validator Set: lookup table keyed by SlotType
//
// Every SlotType has exactly one validator; adding a type to the union
// without registering one here is a compile error.

import type { SlotType } from '../extraction/types';
import { createLogger } from '../observability/logger';
import { createAmountValidator } from './amount';
import { validateEmail, validatePhone } from './contact';
import { createDateValidator, isDateFormat, DATE_FORMATS, type DateFormat } from './date';
import { validateName } from './names';
import { validateNumber } from './number';
import { validatePercentage } from './percentage';
import { validateText } from './text';
import type { ValidationResult, ValidatorTable } from './types';

export type { SlotValidator, ValidationResult, ValidatorTable } from './types';
export type { DateFormat } from './date';

const log = createLogger('validators');

export interface ValidatorOptions {
  /** Format names; unknown names are ignored */
  dateFormats?: readonly string[];
  amountPrecision?: number;
}

function resolveDateFormats(names: readonly string[] | undefined): readonly DateFormat[] {
  if (!names) return DATE_FORMATS;
  const known = names.filter(isDateFormat);
  const unknown = names.filter((n) => !isDateFormat(n));
  if (unknown.length > 0) log.warn({ unknown }, 'ignoring unknown date formats');
  return known.length > 0 ? known : DATE_FORMATS;
}

export function createValidators(options: ValidatorOptions = {}): ValidatorTable {
  return {
    person_name: validateName,
    organization_name: validateName,
    date: createDateValidator(resolveDateFormats(options.dateFormats)),
    monetary_amount: createAmountValidator(options.amountPrecision ?? 2),
    address: validateText,
    duration: validateText,
    free_text: validateText,
    email: validateEmail,
    phone: validatePhone,
    percentage: validatePercentage,
    number: validateNumber,
  };
}

export const defaultValidators: ValidatorTable = createValidators();

export function validateValue(
  type: SlotType,
  raw: string,
  validators: ValidatorTable = defaultValidators
): ValidationResult {
  return validators[type](raw);
}
