import { ActivityDefinition } from '../types/activity.js';

// Activities the registry starts with on every boot
export const SEED_ACTIVITIES: Record<string, ActivityDefinition> = {
  'Chess Club': {
    description: 'Learn strategies and compete in chess tournaments',
    schedule: 'Fridays, 3:30 PM - 5:00 PM',
    maxParticipants: 12,
    participants: ['michael@mergington.edu', 'daniel@mergington.edu']
  },
  'Programming Class': {
    description: 'Learn programming fundamentals and build software projects',
    schedule: 'Tuesdays and Thursdays, 3:30 PM - 4:30 PM',
    maxParticipants: 20,
    participants: ['emma@mergington.edu', 'sophia@mergington.edu']
  },
  'Gym Class': {
    description: 'Physical education and sports activities',
    schedule: 'Mondays, Wednesdays, Fridays, 2:00 PM - 3:00 PM',
    maxParticipants: 30,
    participants: ['john@mergington.edu', 'olivia@mergington.edu']
  },
  'Basketball Team': {
    description: 'Competitive basketball training and tournaments',
    schedule: 'Mondays and Thursdays, 4:00 PM - 5:30 PM',
    maxParticipants: 15,
    participants: []
  },
  'Tennis Club': {
    description: 'Learn tennis techniques and compete in matches',
    schedule: 'Wednesdays and Saturdays, 3:00 PM - 4:30 PM',
    maxParticipants: 10,
    participants: []
  },
  'Drama Club': {
    description: 'Perform in theatrical productions and develop acting skills',
    schedule: 'Tuesdays, 4:00 PM - 5:30 PM',
    maxParticipants: 25,
    participants: []
  },
  'Art Studio': {
    description: 'Explore painting, drawing, and sculpture techniques',
    schedule: 'Wednesdays and Fridays, 3:30 PM - 5:00 PM',
    maxParticipants: 18,
    participants: []
  },
  'Debate Team': {
    description: 'Develop argumentation and public speaking skills',
    schedule: 'Mondays and Wednesdays, 3:30 PM - 4:30 PM',
    maxParticipants: 16,
    participants: []
  },
  'Robotics Club': {
    description: 'Build and program robots for competitions',
    schedule: 'Thursdays, 4:00 PM - 5:30 PM',
    maxParticipants: 14,
    participants: []
  }
};
