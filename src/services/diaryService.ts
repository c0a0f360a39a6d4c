import { AppError, DuplicateEntryError, EmptyInputError } from '../errors';
import { diaryLogger } from '../logger';
import type { DataStore } from '../store';
import type { DiaryEntry, WellbeingLevel } from '../types';
import { formatTimestamp, now, parseEntryDate } from '../utils';
import type { SentimentService } from './sentimentService';

export class DiaryService {
  constructor(
    private readonly store: DataStore,
    private readonly sentiment: SentimentService,
    private readonly timeZone?: string
  ) {}

  /** Classifies the trimmed text and saves it as today's entry. */
  async submit(userId: string, rawText: string): Promise<DiaryEntry> {
    const text = rawText.trim();
    if (!text) {
      throw new EmptyInputError();
    }
    const { level, polarity } = this.sentiment.classify(text);
    const timestamp = formatTimestamp(now(), this.timeZone);
    const entry = await this.addEntryWithSentiment(userId, text, timestamp, level, polarity);
    diaryLogger.debug({ userId, date: entry.date, level }, 'Diary entry saved');
    return entry;
  }

  async addEntry(userId: string, text: string, timestamp: string): Promise<DiaryEntry> {
    return this.insert(userId, text, timestamp);
  }

  async addEntryWithSentiment(
    userId: string,
    text: string,
    timestamp: string,
    level: WellbeingLevel,
    polarity: number
  ): Promise<DiaryEntry> {
    return this.insert(userId, text, timestamp, { wellbeingLevel: level, polarity });
  }

  async getEntries(userId: string): Promise<DiaryEntry[]> {
    return this.store.listEntries(userId);
  }

  async getEntriesForMonth(userId: string, year: number, month: number): Promise<DiaryEntry[]> {
    return this.store.listEntriesForMonth(userId, year, month);
  }

  private async insert(
    userId: string,
    text: string,
    timestamp: string,
    sentiment: { wellbeingLevel?: WellbeingLevel; polarity?: number } = {}
  ): Promise<DiaryEntry> {
    const body = text.trim();
    if (!body) {
      throw new EmptyInputError();
    }
    const { polarity } = sentiment;
    if (polarity !== undefined && !(Number.isFinite(polarity) && Math.abs(polarity) <= 1)) {
      throw new AppError(400, 40013, 'Polarity must be a number between -1 and 1', {
        polarity: String(polarity)
      });
    }
    const parsed = parseEntryDate(timestamp);
    if (!parsed) {
      throw new AppError(400, 40012, 'Entry timestamp must start with a YYYY-MM-DD date', {
        timestamp
      });
    }
    const entry = await this.store.addEntry({
      userId,
      text: body,
      timestamp,
      date: parsed.date,
      ...sentiment
    });
    if (!entry) {
      throw new DuplicateEntryError(parsed.date);
    }
    return entry;
  }
}
