// --- Seed loading: the roster the registry starts from ---

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { Activity, ActivityMap } from './types.js';
import { describeInvalidActivity } from './registry.js';

const DEFAULT_SEED_FILE = fileURLToPath(new URL('../../data/activities.json', import.meta.url));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseActivity(name: string, raw: unknown): Activity {
  if (!isRecord(raw)) {
    throw new Error(`activity "${name}" must be an object`);
  }
  const { description, schedule, max_participants, participants } = raw;
  if (typeof description !== 'string') throw new Error(`activity "${name}" is missing a string "description"`);
  if (typeof schedule !== 'string') throw new Error(`activity "${name}" is missing a string "schedule"`);
  if (typeof max_participants !== 'number') throw new Error(`activity "${name}" is missing a numeric "max_participants"`);
  if (!Array.isArray(participants) || !participants.every((p): p is string => typeof p === 'string')) {
    throw new Error(`activity "${name}" needs "participants" as an array of strings`);
  }

  const activity: Activity = { description, schedule, max_participants, participants };
  const problem = describeInvalidActivity(name, activity);
  if (problem) throw new Error(problem);
  return activity;
}

/**
 * Validates parsed JSON shaped like the GET /activities response.
 * Throws naming the first offending activity.
 */
export function parseSeed(data: unknown): ActivityMap {
  if (!isRecord(data)) {
    throw new Error('seed must be a JSON object keyed by activity name');
  }
  return Object.fromEntries(
    Object.entries(data).map(([name, raw]): [string, Activity] => [name, parseActivity(name, raw)]),
  );
}

export function loadSeedFile(filePath: string = DEFAULT_SEED_FILE): ActivityMap {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`could not read seed file ${filePath}: ${reason}`);
  }
  try {
    return parseSeed(data);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`invalid seed file ${filePath}: ${reason}`);
  }
}
