import { z } from 'zod';
import { Activity, ActivityDefinition, ActivityListing, ActivityRecord, MutationResult } from '../types/activity.js';
import { RegistryError } from '../utils/errors.js';
import { logger, logRegistry } from '../utils/logger.js';

const ACTIVITY_NOT_FOUND = 'Activity not found';
const ALREADY_SIGNED_UP = 'Student is already signed up for this activity';
const NOT_REGISTERED = 'Student is not registered for this activity';

const activityDefinitionSchema = z.object({
  description: z.string(),
  schedule: z.string(),
  maxParticipants: z.number().int().positive(),
  participants: z.array(z.string().min(1)).refine(
    participants => new Set(participants).size === participants.length,
    { message: 'Participants must be unique' }
  )
});

function toRecord(activity: Activity): ActivityRecord {
  return {
    description: activity.description,
    schedule: activity.schedule,
    max_participants: activity.maxParticipants,
    participants: [...activity.participants]
  };
}

/**
 * In-memory store of activities keyed by name, in insertion order.
 *
 * Every method is synchronous, so on Node's single event loop each read or
 * mutation runs to completion before another request is handled.
 */
export class ActivityRegistry {
  private readonly activities = new Map<string, Activity>();

  constructor(seed: Record<string, ActivityDefinition>) {
    for (const [name, definition] of Object.entries(seed)) {
      const result = activityDefinitionSchema.safeParse(definition);
      if (!result.success) {
        throw new Error(`Invalid seed activity "${name}": ${result.error.issues.map(i => i.message).join(', ')}`);
      }

      this.activities.set(name, {
        name,
        ...result.data,
        participants: [...result.data.participants]
      });
    }

    logger.debug('Activity registry seeded', {
      tags: ['registry', 'seed'],
      activities: this.activities.size
    });
  }

  get size(): number {
    return this.activities.size;
  }

  list(): ActivityListing {
    const listing: ActivityListing = {};
    for (const [name, activity] of this.activities) {
      listing[name] = toRecord(activity);
    }
    return listing;
  }

  get(activityName: string): ActivityRecord {
    return toRecord(this.findOrThrow(activityName));
  }

  signup(activityName: string, email: string): MutationResult {
    const activity = this.activities.get(activityName);
    if (!activity) {
      logRegistry.rejected('signup', activityName, email, ACTIVITY_NOT_FOUND);
      throw new RegistryError('NotFound', ACTIVITY_NOT_FOUND);
    }

    if (activity.participants.includes(email)) {
      logRegistry.rejected('signup', activityName, email, ALREADY_SIGNED_UP);
      throw new RegistryError('InvalidState', ALREADY_SIGNED_UP);
    }

    // Capacity is informational only; signups past maxParticipants are accepted
    activity.participants.push(email);
    logRegistry.signedUp(activityName, email, activity.participants.length);

    return { message: `Signed up ${email} for ${activityName}` };
  }

  unregister(activityName: string, email: string): MutationResult {
    const activity = this.activities.get(activityName);
    if (!activity) {
      logRegistry.rejected('unregister', activityName, email, ACTIVITY_NOT_FOUND);
      throw new RegistryError('NotFound', ACTIVITY_NOT_FOUND);
    }

    const index = activity.participants.indexOf(email);
    if (index === -1) {
      logRegistry.rejected('unregister', activityName, email, NOT_REGISTERED);
      throw new RegistryError('InvalidState', NOT_REGISTERED);
    }

    activity.participants.splice(index, 1);
    logRegistry.unregistered(activityName, email, activity.participants.length);

    return { message: `Unregistered ${email} from ${activityName}` };
  }

  private findOrThrow(activityName: string): Activity {
    const activity = this.activities.get(activityName);
    if (!activity) {
      throw new RegistryError('NotFound', ACTIVITY_NOT_FOUND);
    }
    return activity;
  }
}
