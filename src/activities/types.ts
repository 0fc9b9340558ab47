// --- Activity Catalog: Types ---

export interface Activity {
  description: string;
  schedule: string;
  maxParticipants: number;
  participants: string[];
}

export interface ActivitySeed {
  name: string;
  description: string;
  schedule: string;
  maxParticipants: number;
  participants: string[];
}

/** Wire shape of one activity in `GET /activities`. */
export interface ActivityView {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

export type RegistrationError =
  | { kind: 'not_found'; target: 'activity'; activity: string }
  | { kind: 'not_found'; target: 'participant'; activity: string; email: string }
  | { kind: 'duplicate_registration'; activity: string; email: string }
  | { kind: 'capacity_exceeded'; activity: string; maxParticipants: number };

export type RegistrationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RegistrationError };

export interface Registration {
  activity: string;
  email: string;
}
