/**
 * Activity Registry - in-memory store of activities and their rosters
 *
 * All operations are synchronous, so on Node's event loop every
 * read-modify-write completes before another one starts.
 */

import {
  ActivityFullError,
  ActivityNotFoundError,
  AlreadyRegisteredError,
  ParticipantNotFoundError,
} from '../errors/registry-error';
import type { ActivityCatalog, ActivityRecord, ActivitySeed, MessageResponse } from '../types/activity';
import { loadDefaultSeed } from './seed';

export interface ActivityRegistryOptions {
  /** Reject signups once the roster reaches max_participants (default: true) */
  enforceCapacity?: boolean;
}

function copyRecord(record: ActivityRecord): ActivityRecord {
  return { ...record, participants: [...record.participants] };
}

export class ActivityRegistry {
  private activities = new Map<string, ActivityRecord>();
  readonly enforceCapacity: boolean;

  constructor(seed: ActivitySeed, options: ActivityRegistryOptions = {}) {
    for (const [name, record] of Object.entries(seed)) {
      this.activities.set(name, copyRecord(record));
    }
    this.enforceCapacity = options.enforceCapacity ?? true;
  }

  /**
   * Number of activities
   */
  get size(): number {
    return this.activities.size;
  }

  has(activityName: string): boolean {
    return this.activities.has(activityName);
  }

  /**
   * Snapshot of every activity, keyed by name in seed order
   */
  list(): ActivityCatalog {
    return Object.fromEntries(
      [...this.activities].map(([name, record]): [string, ActivityRecord] => [name, copyRecord(record)])
    );
  }

  /**
   * Snapshot of a single activity
   */
  get(activityName: string): ActivityRecord {
    return copyRecord(this.require(activityName));
  }

  signup(activityName: string, email: string): MessageResponse {
    const activity = this.require(activityName);

    if (activity.participants.includes(email)) {
      throw new AlreadyRegisteredError(activityName, email);
    }

    if (this.enforceCapacity && activity.participants.length >= activity.max_participants) {
      throw new ActivityFullError(activityName, activity.max_participants);
    }

    activity.participants.push(email);
    return { message: `${email} signed up for ${activityName}` };
  }

  removeParticipant(activityName: string, email: string): MessageResponse {
    const activity = this.require(activityName);

    const index = activity.participants.indexOf(email);
    if (index === -1) {
      throw new ParticipantNotFoundError(activityName, email);
    }

    activity.participants.splice(index, 1);
    return { message: `Removed ${email} from ${activityName}` };
  }

  private require(activityName: string): ActivityRecord {
    const activity = this.activities.get(activityName);
    if (!activity) {
      throw new ActivityNotFoundError(activityName);
    }
    return activity;
  }
}

/**
 * Build a registry from the bundled seed
 */
export function createDefaultRegistry(options?: ActivityRegistryOptions): ActivityRegistry {
  return new ActivityRegistry(loadDefaultSeed(), options);
}
