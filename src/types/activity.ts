export interface Activity {
  name: string;
  description: string;
  schedule: string;
  maxParticipants: number;
  participants: string[];
}

// Seed definitions carry everything but the name, which is the map key
export type ActivityDefinition = Omit<Activity, 'name'>;

// JSON shape served over HTTP
export interface ActivityRecord {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

export type ActivityListing = Record<string, ActivityRecord>;

export interface MutationResult {
  message: string;
}
