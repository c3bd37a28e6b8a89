export const STAT_KEYS = ['health', 'attack', 'defense', 'speed'] as const;
export type StatKey = (typeof STAT_KEYS)[number];

/** base ratio는 실수, realized stat은 정수 */
export type StatVector = Record<StatKey, number>;
