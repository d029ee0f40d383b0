export interface ActivitySeed {
  name: string;
  description: string;
  schedule: string;
  maxParticipants: number;
  participants: string[];
}

// Wire shape returned by GET /activities, keyed by activity name
export interface ActivityView {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

export type ActivityCatalog = Record<string, ActivityView>;

export type MembershipOperation = 'signup' | 'unregister' | 'lookup';

export interface MessageResponse {
  message: string;
}
