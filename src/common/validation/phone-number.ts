import { Matches } from 'class-validator';

// +1234567890, 123-456-7890, (123) 456-7890
export const PHONE_NUMBER_PATTERN = /^(\+\d{1,3})?[-.\s]?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}$/;

export const IsPhoneNumberFormat = () =>
  Matches(PHONE_NUMBER_PATTERN, { message: 'Please provide a valid phone number.' });
