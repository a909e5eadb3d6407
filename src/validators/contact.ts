// src/validators/contact.ts
// Validator Set: email addresses and phone numbers

import { accept, reject, type ValidationResult } from './types';

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const PHONE_PATTERN = /^\+?[\d\s\-().]+$/;
const MIN_PHONE_DIGITS = 10;

export function validateEmail(raw: string): ValidationResult {
  const value = raw.trim();
  if (!value) return reject('a value is required');
  if (!EMAIL_PATTERN.test(value)) return reject('invalid email address');
  return accept(value.toLowerCase());
}

export function validatePhone(raw: string): ValidationResult {
  const value = raw.replace(/\s+/g, ' ').trim();
  if (!value) return reject('a value is required');
  if (!PHONE_PATTERN.test(value)) return reject('invalid phone number');

  const digits = value.replace(/\D/g, '').length;
  if (digits < MIN_PHONE_DIGITS) {
    return reject(`a phone number needs at least ${MIN_PHONE_DIGITS} digits`);
  }
  return accept(value);
}
