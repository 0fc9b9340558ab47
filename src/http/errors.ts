import type { RegistrationError } from '../activities/types.js';

export interface HttpError {
  status: number;
  detail: string;
}

export function toHttpError(error: RegistrationError): HttpError {
  switch (error.kind) {
    case 'not_found':
      if (error.target === 'participant') {
        return { status: 404, detail: `Participant '${error.email}' not found in '${error.activity}'` };
      }
      return { status: 404, detail: `Activity '${error.activity}' not found` };
    case 'duplicate_registration':
      return { status: 400, detail: `Student '${error.email}' is already signed up for '${error.activity}'` };
    case 'capacity_exceeded':
      return { status: 400, detail: `Activity '${error.activity}' is full (capacity ${error.maxParticipants})` };
  }
}

export interface ValidationIssue {
  loc: string[];
  msg: string;
  type: 'missing';
}

/** 422 body for a required request field that was absent or empty. */
export function missingField(location: 'query' | 'path', field: string): { detail: ValidationIssue[] } {
  return { detail: [{ loc: [location, field], msg: 'Field required', type: 'missing' }] };
}
