import type { Season } from '../models/ActivityInput';

/**
 * Regnperiod i Kamerun: mars-oktober. Torrperiod: november-februari.
 */
export function getCurrentSeason(date: Date = new Date()): Season {
  const month = date.getMonth() + 1;
  return month >= 3 && month <= 10 ? 'rainy' : 'dry';
}
