/****
 * In-memory activity registry (no flakiness in tests).
 * Each instance starts from its own copy of the seed activities.
 * Check-then-mutate with no locking: safe only because every call is synchronous.
 */

import type { Activity, ActivityMap, RegistryResult } from '../types/activity';
import { SEED_ACTIVITIES } from './seedActivities';

export const ACTIVITY_NOT_FOUND = 'Activity not found';
export const ALREADY_SIGNED_UP = 'Student already signed up for this activity';
export const NOT_SIGNED_UP = 'Student not signed up for this activity';

export interface ActivityStorage {
  listActivities(): ActivityMap;
  getActivity(activityName: string): Activity | null;

  // Roster
  signup(activityName: string, email: string): RegistryResult;
  unregister(activityName: string, email: string): RegistryResult;
}

function copyActivity(activity: Activity): Activity {
  return { ...activity, participants: [...activity.participants] };
}

function copyActivities(source: ActivityMap): Map<string, Activity> {
  return new Map(Object.entries(source).map(([name, activity]) => [name, copyActivity(activity)]));
}

function notFound(): RegistryResult {
  return { success: false, error: { code: 'not_found', message: ACTIVITY_NOT_FOUND } };
}

export function createMemoryStorage(seed: ActivityMap = SEED_ACTIVITIES): ActivityStorage {
  const activities = copyActivities(seed);

  return {
    listActivities() {
      const snapshot: ActivityMap = {};
      for (const [name, activity] of activities) {
        snapshot[name] = copyActivity(activity);
      }
      return snapshot;
    },
    getActivity(activityName: string) {
      const activity = activities.get(activityName);
      return activity ? copyActivity(activity) : null;
    },

    signup(activityName: string, email: string) {
      const activity = activities.get(activityName);
      if (!activity) return notFound();
      if (activity.participants.includes(email)) {
        return { success: false, error: { code: 'invalid_operation', message: ALREADY_SIGNED_UP } };
      }
      activity.participants.push(email);
      return { success: true, message: `Signed up ${email} for ${activityName}` };
    },
    unregister(activityName: string, email: string) {
      const activity = activities.get(activityName);
      if (!activity) return notFound();
      const index = activity.participants.indexOf(email);
      if (index === -1) {
        return { success: false, error: { code: 'invalid_operation', message: NOT_SIGNED_UP } };
      }
      activity.participants.splice(index, 1);
      return { success: true, message: `Unregistered ${email} from ${activityName}` };
    },
  };
}
