import type { ActivityMap } from '../types/activity';

export const SEED_ACTIVITIES: ActivityMap = {
  'Chess Club': {
    description: 'Learn strategies and compete in chess tournaments',
    schedule: 'Fridays, 3:30 PM - 5:00 PM',
    max_participants: 12,
    participants: ['michael@mergington.edu', 'daniel@mergington.edu'],
  },
  'Programming Class': {
    description: 'Learn programming fundamentals and build software projects',
    schedule: 'Tuesdays and Thursdays, 3:30 PM - 4:30 PM',
    max_participants: 20,
    participants: ['emma@mergington.edu', 'sophia@mergington.edu'],
  },
  'Gym Class': {
    description: 'Physical education and sports activities',
    schedule: 'Mondays, Wednesdays, Fridays, 2:00 PM - 3:00 PM',
    max_participants: 30,
    participants: ['john@mergington.edu', 'olivia@mergington.edu'],
  },
  'Basketball Team': {
    description: 'Competitive basketball team for interscholastic games',
    schedule: 'Mondays, Wednesdays, Fridays, 4:00 PM - 5:30 PM',
    max_participants: 15,
    participants: ['alex@mergington.edu'],
  },
  'Tennis Club': {
    description: 'Learn and practice tennis skills with teammates',
    schedule: 'Tuesdays and Thursdays, 4:00 PM - 5:00 PM',
    max_participants: 10,
    participants: [],
  },
  'Drama Club': {
    description: 'Perform in theatrical productions and develop acting skills',
    schedule: 'Wednesdays, 3:30 PM - 5:00 PM',
    max_participants: 25,
    participants: ['isabella@mergington.edu', 'lucas@mergington.edu'],
  },
  'Art Studio': {
    description: 'Explore painting, drawing, and sculpture techniques',
    schedule: 'Mondays and Thursdays, 3:30 PM - 4:30 PM',
    max_participants: 20,
    participants: ['maya@mergington.edu'],
  },
  'Debate Team': {
    description: 'Develop argumentation and public speaking skills through competitive debate',
    schedule: 'Tuesdays and Fridays, 3:30 PM - 4:45 PM',
    max_participants: 16,
    participants: ['ryan@mergington.edu', 'sarah@mergington.edu'],
  },
  'Science Club': {
    description: 'Conduct experiments and explore STEM concepts',
    schedule: 'Wednesdays, 4:00 PM - 5:00 PM',
    max_participants: 18,
    participants: ['aiden@mergington.edu'],
  },
};
