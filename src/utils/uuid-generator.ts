import { v4 as uuidv4, validate as uuidValidate } from 'uuid';

export function generateUrlKey(): string {
  return uuidv4();
}

export function generateJobId(): string {
  return `job-${uuidv4()}`;
}

export function isValidUrlKey(value: string): boolean {
  return uuidValidate(value);
}

export function isValidJobId(value: string): boolean {
  return value.startsWith('job-') && uuidValidate(value.slice(4));
}
