import { KeyedLock } from './lock.js';
import type { Activity, ActivitySeed, ActivityView } from './types.js';

/**
 * In-memory activity catalog. Activity names and their description, schedule
 * and capacity are fixed at construction; only participant lists change.
 *
 * The mutators here do not validate anything. Callers go through
 * {@link RegistrationEngine}, which checks the rules inside {@link withActivity}.
 */
export class ActivityCatalog {
  private activities = new Map<string, Activity>();
  private lock = new KeyedLock();

  constructor(seeds: ActivitySeed[]) {
    for (const seed of seeds) {
      if (this.activities.has(seed.name)) {
        throw new Error(`duplicate activity "${seed.name}" in seed`);
      }
      if (!Number.isInteger(seed.maxParticipants) || seed.maxParticipants < 1) {
        throw new Error(`activity "${seed.name}" needs a positive integer capacity, got ${seed.maxParticipants}`);
      }
      const participants = [...new Set(seed.participants)];
      if (participants.length > seed.maxParticipants) {
        throw new Error(`activity "${seed.name}" seeded with ${participants.length} participants, capacity is ${seed.maxParticipants}`);
      }
      this.activities.set(seed.name, {
        description: seed.description,
        schedule: seed.schedule,
        maxParticipants: seed.maxParticipants,
        participants,
      });
    }
  }

  get size(): number {
    return this.activities.size;
  }

  names(): string[] {
    return Array.from(this.activities.keys());
  }

  lookup(name: string): Activity | undefined {
    return this.activities.get(name);
  }

  /** Seed-ordered copies; later mutations don't show up in a returned list. */
  listAll(): Array<[string, Activity]> {
    const result: Array<[string, Activity]> = [];
    for (const [name, activity] of this.activities) {
      result.push([name, { ...activity, participants: [...activity.participants] }]);
    }
    return result;
  }

  snapshot(): Record<string, ActivityView> {
    const view: Record<string, ActivityView> = {};
    for (const [name, activity] of this.listAll()) {
      view[name] = {
        description: activity.description,
        schedule: activity.schedule,
        max_participants: activity.maxParticipants,
        participants: activity.participants,
      };
    }
    return view;
  }

  addParticipant(name: string, email: string): void {
    this.activities.get(name)?.participants.push(email);
  }

  removeParticipant(name: string, email: string): void {
    const activity = this.activities.get(name);
    if (!activity) return;
    const idx = activity.participants.indexOf(email);
    if (idx !== -1) {
      activity.participants.splice(idx, 1);
    }
  }

  /** Run `fn` while holding this activity's lock. */
  withActivity<T>(name: string, fn: (activity: Activity | undefined) => T | Promise<T>): Promise<T> {
    return this.lock.run(name, () => fn(this.activities.get(name)));
  }
}
