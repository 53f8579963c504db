import { EDITABLE_REQUEST_FIELDS, type RequestFields, type RevisionFields } from '../types/request.js';

export type Body = Record<string, unknown>;

const isRecord = (value: unknown): value is Body =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const readBody = (value: unknown): Body => (isRecord(value) ? value : {});

export const optionalText = (body: Body, key: string): string | null | undefined => {
  const value = body[key];
  if (value === undefined) {
    return undefined;
  }
  if (value === null) {
    return null;
  }
  return String(value);
};

export const textOrNull = (body: Body, key: string): string | null => optionalText(body, key) ?? null;

export const optionalNumber = (body: Body, key: string): number | null | undefined => {
  const value = body[key];
  if (value === undefined) {
    return undefined;
  }
  if (value === null || value === '') {
    return null;
  }
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

export const flag = (body: Body, key: string): boolean => {
  const value = body[key];
  return value === true || value === 'true' || value === 1;
};

export const readRequestFields = (body: Body): RequestFields => {
  const fields: RequestFields = {};
  for (const key of EDITABLE_REQUEST_FIELDS) {
    if (key === 'requestedAmount') {
      const amount = optionalNumber(body, key);
      if (amount !== undefined) {
        fields.requestedAmount = amount;
      }
      continue;
    }
    const text = optionalText(body, key);
    if (text !== undefined) {
      fields[key] = text;
    }
  }
  return fields;
};

export const readRevisionFields = (body: Body): RevisionFields => {
  const fields: RevisionFields = {};
  const businessJustification = optionalText(body, 'businessJustification');
  const expectedOutcome = optionalText(body, 'expectedOutcome');
  const riskAssessment = optionalText(body, 'riskAssessment');
  if (businessJustification !== undefined) fields.businessJustification = businessJustification;
  if (expectedOutcome !== undefined) fields.expectedOutcome = expectedOutcome;
  if (riskAssessment !== undefined) fields.riskAssessment = riskAssessment;
  return fields;
};

export const queryText = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);
