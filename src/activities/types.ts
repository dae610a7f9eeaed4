// --- Activity Registry Types ---

export interface Activity {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

/** Activity name -> record, in registry insertion order. Same shape as GET /activities. */
export type ActivityMap = Record<string, Activity>;

export type RegistryErrorKind = 'not_found' | 'conflict' | 'invalid';

export type RegistryResult =
  | { ok: true; message: string }
  | { ok: false; kind: RegistryErrorKind; error: string };

export const ACTIVITY_NOT_FOUND = 'Activity not found';
export const ALREADY_SIGNED_UP = 'Student already signed up for this activity';
export const NOT_REGISTERED = 'Student not registered for this activity';
export const ACTIVITY_EXISTS = 'Activity already exists';
