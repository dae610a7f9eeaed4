import type { Activity, ActivityMap, RegistryResult } from './types.js';
import { ACTIVITY_NOT_FOUND, ALREADY_SIGNED_UP, NOT_REGISTERED, ACTIVITY_EXISTS } from './types.js';

function copyActivity(activity: Activity): Activity {
  return { ...activity, participants: [...activity.participants] };
}

/**
 * Returns a reason the definition breaks the data model, or null if it is valid.
 */
export function describeInvalidActivity(name: string, activity: Activity): string | null {
  if (!name.trim()) return 'activity name must not be empty';
  if (!Number.isInteger(activity.max_participants) || activity.max_participants <= 0) {
    return `max_participants for "${name}" must be a positive integer`;
  }
  if (new Set(activity.participants).size !== activity.participants.length) {
    return `participants for "${name}" contain duplicates`;
  }
  return null;
}

/**
 * In-memory roster of extracurricular activities.
 *
 * Constructed once at startup and passed to the HTTP layer. Every record handed
 * out is a copy, so callers can never change a roster except through
 * signUp/unregister/addActivity. max_participants is stored but not enforced.
 */
export class ActivityRegistry {
  private readonly activities = new Map<string, Activity>();

  constructor(seed: ActivityMap = {}) {
    for (const [name, activity] of Object.entries(seed)) {
      const result = this.addActivity(name, activity);
      if (!result.ok) {
        throw new Error(`invalid seed activity: ${result.error}`);
      }
    }
  }

  get size(): number {
    return this.activities.size;
  }

  has(name: string): boolean {
    return this.activities.has(name);
  }

  get(name: string): Activity | undefined {
    const activity = this.activities.get(name);
    return activity ? copyActivity(activity) : undefined;
  }

  list(): ActivityMap {
    // fromEntries defines own keys, so an activity named "__proto__" survives
    return Object.fromEntries(
      Array.from(this.activities, ([name, activity]): [string, Activity] => [name, copyActivity(activity)]),
    );
  }

  addActivity(name: string, activity: Activity): RegistryResult {
    if (this.activities.has(name)) {
      return { ok: false, kind: 'conflict', error: ACTIVITY_EXISTS };
    }
    const problem = describeInvalidActivity(name, activity);
    if (problem) {
      return { ok: false, kind: 'invalid', error: problem };
    }
    this.activities.set(name, copyActivity(activity));
    return { ok: true, message: `Added ${name}` };
  }

  signUp(activityName: string, email: string): RegistryResult {
    const activity = this.activities.get(activityName);
    if (!activity) {
      return { ok: false, kind: 'not_found', error: ACTIVITY_NOT_FOUND };
    }
    if (activity.participants.includes(email)) {
      return { ok: false, kind: 'conflict', error: ALREADY_SIGNED_UP };
    }

    activity.participants.push(email);
    console.log(`[Registry] ${email} joined ${activityName} (${activity.participants.length}/${activity.max_participants})`);
    return { ok: true, message: `Signed up ${email} for ${activityName}` };
  }

  unregister(activityName: string, email: string): RegistryResult {
    const activity = this.activities.get(activityName);
    if (!activity) {
      return { ok: false, kind: 'not_found', error: ACTIVITY_NOT_FOUND };
    }
    const idx = activity.participants.indexOf(email);
    if (idx === -1) {
      return { ok: false, kind: 'conflict', error: NOT_REGISTERED };
    }

    activity.participants.splice(idx, 1);
    console.log(`[Registry] ${email} left ${activityName} (${activity.participants.length}/${activity.max_participants})`);
    return { ok: true, message: `Unregistered ${email} from ${activityName}` };
  }
}
