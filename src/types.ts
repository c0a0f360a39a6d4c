export const WELLBEING_LEVELS = ['very sad', 'sad', 'normal', 'happy', 'very happy'] as const;

export type WellbeingLevel = (typeof WELLBEING_LEVELS)[number];

export function isWellbeingLevel(value: unknown): value is WellbeingLevel {
  return typeof value === 'string' && (WELLBEING_LEVELS as readonly string[]).includes(value);
}

export interface User {
  id: string;
  username: string;
  passwordHash: string;
  createdAt: string;
}

export interface Session {
  token: string;
  userId: string;
  createdAt: string;
}

export interface UserSettings {
  userId: string;
  timerLength: number;
}

export interface DiaryEntry {
  id: number;
  userId: string;
  text: string;
  timestamp: string;
  date: string;
  wellbeingLevel: WellbeingLevel | null;
  polarity: number | null;
}

export interface NewDiaryEntry {
  userId: string;
  text: string;
  timestamp: string;
  date: string;
  wellbeingLevel?: WellbeingLevel;
  polarity?: number;
}

export interface YearMonth {
  year: number;
  month: number;
}

export interface WellbeingCounts {
  verySad: number;
  sad: number;
  normal: number;
  happy: number;
  veryHappy: number;
}

export interface MonthStats {
  counts: WellbeingCounts;
  avgPolarity: number;
  happiestDay: string | null;
  happiestEntry: string | null;
}

export interface MonthlySummary extends YearMonth {
  userId: string;
  stats: MonthStats;
  generatedAt: string;
}

export interface SentimentResult {
  level: WellbeingLevel;
  polarity: number;
}

export interface Recommendation {
  text: string;
  source: 'model' | 'fallback';
}
