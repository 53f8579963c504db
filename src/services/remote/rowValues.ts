import dayjs from 'dayjs';
import type { RemoteRow } from '../../types/remote.js';

export const textValue = (row: RemoteRow, column: string): string | null => {
  const value = row[column];
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    return dayjs(value).toISOString();
  }
  return String(value);
};

export const requiredText = (row: RemoteRow, column: string, fallback = ''): string =>
  textValue(row, column) ?? fallback;

export const numberValue = (row: RemoteRow, column: string): number | null => {
  const value = row[column];
  if (value === null || value === undefined || value === '') {
    return null;
  }
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

export const integerValue = (row: RemoteRow, column: string): number | null => {
  const parsed = numberValue(row, column);
  return parsed === null ? null : Math.trunc(parsed);
};

export const booleanValue = (row: RemoteRow, column: string): boolean => {
  const value = row[column];
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value === 1;
  }
  if (typeof value === 'string') {
    return ['1', 'true', 't', 'y', 'yes'].includes(value.trim().toLowerCase());
  }
  return false;
};

/** ISO-8601 text for timestamp columns; other values pass through as text. */
export const timestampValue = (row: RemoteRow, column: string): string | null => {
  const value = row[column];
  if (value instanceof Date) {
    return dayjs(value).toISOString();
  }
  return textValue(row, column);
};

export const toSnakeCase = (field: string): string => field.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
