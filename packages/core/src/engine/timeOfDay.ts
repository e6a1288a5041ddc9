import type { TimeOfDay } from './types';

export const timeOfDayLabel = (timestamp: number): TimeOfDay => {
  const hour = new Date(timestamp).getHours();
  if (hour >= 5 && hour < 12) return 'morning';
  if (hour >= 12 && hour < 17) return 'day';
  if (hour >= 17 && hour < 21) return 'evening';
  return 'night';
};
