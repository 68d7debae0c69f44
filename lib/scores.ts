export const CHECK_IN_POINTS = 10;
export const STREAK_BONUS_PER_DAY = 2;
export const ACTION_POINTS = 5;
export const ENDORSEMENT_POINTS = 25;
export const MIN_ENDORSER_POINTS = 50;
export const POINTS_PER_LEVEL = 100;
export const SECONDS_PER_DAY = 86400;

export function computeLevel(points: number): number {
  return Math.floor(points / POINTS_PER_LEVEL) + 1;
}

export function checkInReward(streakDays: number): number {
  return streakDays > 1
    ? CHECK_IN_POINTS + streakDays * STREAK_BONUS_PER_DAY
    : CHECK_IN_POINTS;
}

export function dayOf(timestamp: number, daySeconds = SECONDS_PER_DAY): number {
  return Math.floor(timestamp / daySeconds);
}
