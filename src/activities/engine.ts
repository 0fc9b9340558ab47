// --- Registration Engine: signup / removal rules ---

import type { ActivityCatalog } from './catalog.js';
import type { ActivityView, Registration, RegistrationResult } from './types.js';

export class RegistrationEngine {
  constructor(private readonly catalog: ActivityCatalog) {}

  /**
   * Register `email` for `activityName`.
   *
   * Checks run in a fixed order: unknown activity, then already registered,
   * then full. An existing participant of a full activity gets
   * `duplicate_registration`, not `capacity_exceeded`.
   * Emails are compared exactly; `A@x.com` and `a@x.com` are two people.
   */
  signup(activityName: string, email: string): Promise<RegistrationResult<Registration>> {
    return this.catalog.withActivity(activityName, (activity): RegistrationResult<Registration> => {
      if (!activity) {
        console.log(`[Registry] signup rejected: unknown activity "${activityName}"`);
        return { ok: false, error: { kind: 'not_found', target: 'activity', activity: activityName } };
      }
      if (activity.participants.includes(email)) {
        console.log(`[Registry] signup rejected: ${email} already in "${activityName}"`);
        return { ok: false, error: { kind: 'duplicate_registration', activity: activityName, email } };
      }
      if (activity.participants.length >= activity.maxParticipants) {
        console.log(`[Registry] signup rejected: "${activityName}" full (${activity.maxParticipants})`);
        return {
          ok: false,
          error: { kind: 'capacity_exceeded', activity: activityName, maxParticipants: activity.maxParticipants },
        };
      }

      this.catalog.addParticipant(activityName, email);
      console.log(`[Registry] ${email} signed up for "${activityName}" (${activity.participants.length}/${activity.maxParticipants})`);
      return { ok: true, value: { activity: activityName, email } };
    });
  }

  remove(activityName: string, email: string): Promise<RegistrationResult<Registration>> {
    return this.catalog.withActivity(activityName, (activity): RegistrationResult<Registration> => {
      if (!activity) {
        console.log(`[Registry] remove rejected: unknown activity "${activityName}"`);
        return { ok: false, error: { kind: 'not_found', target: 'activity', activity: activityName } };
      }
      if (!activity.participants.includes(email)) {
        console.log(`[Registry] remove rejected: ${email} not in "${activityName}"`);
        return { ok: false, error: { kind: 'not_found', target: 'participant', activity: activityName, email } };
      }

      this.catalog.removeParticipant(activityName, email);
      console.log(`[Registry] ${email} removed from "${activityName}"`);
      return { ok: true, value: { activity: activityName, email } };
    });
  }

  /**
   * Full catalog view. Mutations are synchronous inside their lock, so a
   * snapshot taken here never sees a half-applied signup or removal.
   */
  listActivities(): Record<string, ActivityView> {
    return this.catalog.snapshot();
  }

  get activityCount(): number {
    return this.catalog.size;
  }
}
