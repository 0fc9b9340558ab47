// --- Activity Seed: the catalog every process starts from ---

import type { ActivitySeed } from './types.js';

const seeds: ActivitySeed[] = [
  {
    name: 'Chess Club',
    description: 'Learn strategies and compete in chess tournaments',
    schedule: 'Fridays, 3:30 PM - 5:00 PM',
    maxParticipants: 12,
    participants: ['michael@mergington.edu', 'daniel@mergington.edu'],
  },
  {
    name: 'Programming Class',
    description: 'Learn programming fundamentals and build software projects',
    schedule: 'Tuesdays and Thursdays, 3:30 PM - 4:30 PM',
    maxParticipants: 20,
    participants: ['emma@mergington.edu', 'sophia@mergington.edu'],
  },
  {
    name: 'Gym Class',
    description: 'Physical education and sports activities',
    schedule: 'Mondays, Wednesdays, Fridays, 2:00 PM - 3:00 PM',
    maxParticipants: 30,
    participants: ['john@mergington.edu', 'olivia@mergington.edu'],
  },
  {
    name: 'Soccer Team',
    description: 'Join the school soccer team and compete in matches',
    schedule: 'Tuesdays and Thursdays, 4:00 PM - 5:30 PM',
    maxParticipants: 22,
    participants: ['liam@mergington.edu', 'noah@mergington.edu'],
  },
  {
    name: 'Basketball Team',
    description: 'Practice and play basketball with the school team',
    schedule: 'Wednesdays and Fridays, 3:30 PM - 5:00 PM',
    maxParticipants: 15,
    participants: ['ava@mergington.edu', 'mia@mergington.edu'],
  },
  {
    name: 'Tennis Club',
    description: 'Improve your serve and play friendly matches',
    schedule: 'Mondays and Wednesdays, 4:00 PM - 5:30 PM',
    maxParticipants: 10,
    participants: ['lucas@mergington.edu'],
  },
  {
    name: 'Art Studio',
    description: 'Explore painting, drawing, and mixed media',
    schedule: 'Thursdays, 3:30 PM - 5:00 PM',
    maxParticipants: 18,
    participants: ['amelia@mergington.edu', 'harper@mergington.edu'],
  },
  {
    name: 'Drama Club',
    description: 'Act, direct, and produce plays and performances',
    schedule: 'Mondays and Wednesdays, 3:30 PM - 5:00 PM',
    maxParticipants: 20,
    participants: ['ella@mergington.edu', 'scarlett@mergington.edu'],
  },
  {
    name: 'Debate Team',
    description: 'Develop public speaking and argumentation skills',
    schedule: 'Tuesdays, 3:30 PM - 5:00 PM',
    maxParticipants: 16,
    participants: ['james@mergington.edu', 'benjamin@mergington.edu'],
  },
  {
    name: 'Science Club',
    description: 'Hands-on experiments and science fair preparation',
    schedule: 'Fridays, 2:00 PM - 3:30 PM',
    maxParticipants: 14,
    participants: ['henry@mergington.edu', 'alexander@mergington.edu'],
  },
];

/**
 * Fresh copies of the seed list. Each catalog gets its own participant arrays,
 * so mutating one catalog never leaks into another.
 */
export function createSeedActivities(): ActivitySeed[] {
  return seeds.map(s => ({ ...s, participants: [...s.participants] }));
}
