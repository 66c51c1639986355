import { STATUS_CODES } from 'node:http';

export const MIN_STATUS_CODE = 100;
export const MAX_STATUS_CODE = 599;

/** Registered reason phrase for `code`, or '' when the code is unknown. */
export function getReasonPhrase(code: number): string {
  return STATUS_CODES[code] ?? '';
}

export function isValidStatusCode(code: number): boolean {
  return (
    Number.isInteger(code) &&
    code >= MIN_STATUS_CODE &&
    code <= MAX_STATUS_CODE
  );
}
