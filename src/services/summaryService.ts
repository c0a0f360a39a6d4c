import { AppError } from '../errors';
import { summaryLogger } from '../logger';
import { compareEntriesAscending, type DataStore } from '../store';
import type {
  DiaryEntry,
  MonthStats,
  MonthlySummary,
  WellbeingCounts,
  WellbeingLevel,
  YearMonth
} from '../types';
import { currentYearMonth, monthKey, now, toIso } from '../utils';

const COUNT_FIELD: Record<WellbeingLevel, keyof WellbeingCounts> = {
  'very sad': 'verySad',
  sad: 'sad',
  normal: 'normal',
  happy: 'happy',
  'very happy': 'veryHappy'
};

// Below any valid polarity, so a month without scores keeps no happiest day.
const HAPPIEST_BASELINE = -2;

export function emptyCounts(): WellbeingCounts {
  return { verySad: 0, sad: 0, normal: 0, happy: 0, veryHappy: 0 };
}

/**
 * Tallies levels, averages the scored entries and picks the happiest one.
 * Entries are scanned oldest first and only a strictly higher polarity
 * replaces the current happiest, so ties keep the earliest entry.
 */
export function computeMonthStats(entries: DiaryEntry[]): MonthStats {
  const counts = emptyCounts();
  let polaritySum = 0;
  let polarityCount = 0;
  let happiest: { polarity: number; timestamp: string | null; text: string | null } = {
    polarity: HAPPIEST_BASELINE,
    timestamp: null,
    text: null
  };

  entries
    .slice()
    .sort(compareEntriesAscending)
    .forEach((entry) => {
      if (entry.wellbeingLevel) {
        counts[COUNT_FIELD[entry.wellbeingLevel]] += 1;
      }
      if (entry.polarity === null) {
        return;
      }
      polaritySum += entry.polarity;
      polarityCount += 1;
      if (entry.polarity > happiest.polarity) {
        happiest = { polarity: entry.polarity, timestamp: entry.timestamp, text: entry.text };
      }
    });

  return {
    counts,
    avgPolarity: polarityCount > 0 ? polaritySum / polarityCount : 0,
    happiestDay: happiest.timestamp,
    happiestEntry: happiest.text
  };
}

export interface MonthOverview extends YearMonth {
  entryCount: number;
  stats: MonthStats;
}

export class SummaryService {
  constructor(
    private readonly store: DataStore,
    private readonly timeZone?: string
  ) {}

  /** Recomputes and upserts the summary of every month that has entries; returns how many. */
  async generateAllSummaries(userId: string): Promise<number> {
    const months = await this.store.listEntryMonths(userId);
    const generatedAt = toIso(now());
    for (const { year, month } of months) {
      const entries = await this.store.listEntriesForMonth(userId, year, month);
      if (entries.length === 0) {
        continue;
      }
      await this.store.upsertMonthlySummary({
        userId,
        year,
        month,
        stats: computeMonthStats(entries),
        generatedAt
      });
    }
    summaryLogger.debug({ userId, months: months.length }, 'Monthly summaries generated');
    return months.length;
  }

  /** Live stats for one month, defaulting to the current month. */
  async getMonthOverview(userId: string, selected: Partial<YearMonth> = {}): Promise<MonthOverview> {
    const today = currentYearMonth(now(), this.timeZone);
    const year = selected.year ?? today.year;
    const month = selected.month ?? today.month;
    const entries = await this.store.listEntriesForMonth(userId, year, month);
    if (entries.length === 0) {
      throw new AppError(404, 40401, `No diary entries found for ${monthKey(year, month)}.`);
    }
    return { year, month, entryCount: entries.length, stats: computeMonthStats(entries) };
  }

  async getSummary(userId: string, year: number, month: number): Promise<MonthlySummary> {
    const summary = await this.store.getMonthlySummary(userId, year, month);
    if (!summary) {
      throw new AppError(404, 40402, `No summary for ${monthKey(year, month)}.`);
    }
    return summary;
  }

  async listSummaries(userId: string): Promise<MonthlySummary[]> {
    return this.store.listMonthlySummaries(userId);
  }
}
