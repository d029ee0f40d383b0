import pLimit, { type LimitFunction } from 'p-limit';
import {
  ActivityFullError,
  ActivityNotFoundError,
  AlreadyRegisteredError,
  InvalidSeedError,
  NotRegisteredError,
  RegistryError
} from '../errors.js';
import type {
  ActivityCatalog,
  ActivitySeed,
  ActivityView,
  MembershipOperation
} from '../types/activity.js';
import { logRegistry } from '../utils/logger.js';

interface ActivityEntry {
  readonly name: string;
  readonly description: string;
  readonly schedule: string;
  readonly maxParticipants: number;
  participants: Set<string>;
  // Serializes roster mutations for this activity
  readonly limit: LimitFunction;
}

export interface RegistryOptions {
  /** Reject signups once a roster holds `maxParticipants` emails. Off by default. */
  enforceCapacity?: boolean;
}

function validateSeed(seed: readonly ActivitySeed[]): void {
  const names = new Set<string>();
  for (const activity of seed) {
    if (activity.name.trim().length === 0) {
      throw new InvalidSeedError('Activity name must not be empty');
    }
    if (names.has(activity.name)) {
      throw new InvalidSeedError(`Duplicate activity name: ${activity.name}`);
    }
    names.add(activity.name);

    if (!Number.isInteger(activity.maxParticipants) || activity.maxParticipants <= 0) {
      throw new InvalidSeedError(`max participants for ${activity.name} must be a positive integer`);
    }
    if (new Set(activity.participants).size !== activity.participants.length) {
      throw new InvalidSeedError(`Duplicate participant in seed for ${activity.name}`);
    }
  }
}

/**
 * In-memory directory of activities and their participant rosters.
 *
 * The set of activities is fixed when the registry is built; only rosters
 * change. Signup and unregister on the same activity run one at a time.
 */
export class ActivityRegistry {
  private readonly activities = new Map<string, ActivityEntry>();
  private readonly seed: ActivitySeed[];
  private readonly enforceCapacity: boolean;

  constructor(seed: readonly ActivitySeed[], options: RegistryOptions = {}) {
    validateSeed(seed);
    this.seed = seed.map(activity => ({ ...activity, participants: [...activity.participants] }));
    this.enforceCapacity = options.enforceCapacity ?? false;

    for (const activity of this.seed) {
      this.activities.set(activity.name, {
        name: activity.name,
        description: activity.description,
        schedule: activity.schedule,
        maxParticipants: activity.maxParticipants,
        participants: new Set(activity.participants),
        limit: pLimit(1)
      });
    }

    logRegistry.seeded(this.names(), this.enforceCapacity);
  }

  get size(): number {
    return this.activities.size;
  }

  names(): string[] {
    return [...this.activities.keys()];
  }

  list(): ActivityCatalog {
    const catalog: ActivityCatalog = {};
    for (const entry of this.activities.values()) {
      catalog[entry.name] = this.toView(entry);
    }
    return catalog;
  }

  get(activityName: string): ActivityView {
    return this.toView(this.require(activityName, 'lookup'));
  }

  async signup(activityName: string, email: string): Promise<string> {
    const entry = this.require(activityName, 'signup');

    return entry.limit(() => {
      if (entry.participants.has(email)) {
        throw this.rejected('signup', entry.name, new AlreadyRegisteredError());
      }
      if (this.enforceCapacity && entry.participants.size >= entry.maxParticipants) {
        throw this.rejected('signup', entry.name, new ActivityFullError());
      }

      entry.participants.add(email);
      logRegistry.signedUp(entry.name, email, entry.participants.size);
      return `${email} signed up for ${entry.name}`;
    });
  }

  async unregister(activityName: string, email: string): Promise<string> {
    const entry = this.require(activityName, 'unregister');

    return entry.limit(() => {
      if (!entry.participants.has(email)) {
        throw this.rejected('unregister', entry.name, new NotRegisteredError());
      }

      entry.participants.delete(email);
      logRegistry.unregistered(entry.name, email, entry.participants.size);
      return `${email} unregistered from ${entry.name}`;
    });
  }

  /** Restores every roster to its seeded state. */
  reset(): void {
    for (const activity of this.seed) {
      const entry = this.activities.get(activity.name);
      if (entry) {
        entry.participants = new Set(activity.participants);
      }
    }
  }

  private require(activityName: string, operation: MembershipOperation): ActivityEntry {
    const entry = this.activities.get(activityName);
    if (!entry) {
      throw this.rejected(operation, activityName, new ActivityNotFoundError());
    }
    return entry;
  }

  private rejected(operation: MembershipOperation, activityName: string, error: RegistryError): RegistryError {
    logRegistry.rejected(operation, activityName, error);
    return error;
  }

  private toView(entry: ActivityEntry): ActivityView {
    return {
      description: entry.description,
      schedule: entry.schedule,
      max_participants: entry.maxParticipants,
      participants: [...entry.participants]
    };
  }
}
