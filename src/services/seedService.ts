import { DuplicateEntryError } from '../errors';
import type { DataStore } from '../store';
import { WELLBEING_LEVELS, type WellbeingLevel } from '../types';
import { DiaryService } from './diaryService';
import { SentimentService } from './sentimentService';
import { SummaryService } from './summaryService';

const SAMPLE_TEXT: Record<WellbeingLevel, string> = {
  'very sad': 'I feel miserable and hopeless.',
  sad: 'I am tired and lonely.',
  normal: 'It was an okay day.',
  happy: 'I feel happy and grateful.',
  'very happy': 'Today was amazing and wonderful!'
};

/**
 * Writes one sample entry per day for the `days` days before `until`,
 * cycling through the wellbeing levels. Days that already have an entry are skipped.
 */
export async function seedDiary(
  store: DataStore,
  userId: string,
  days: number,
  until: Date
): Promise<{ created: number; skipped: number }> {
  const sentiment = new SentimentService();
  const diary = new DiaryService(store, sentiment);
  let created = 0;
  let skipped = 0;

  for (let offset = days; offset >= 1; offset -= 1) {
    const day = new Date(until.getTime() - offset * 24 * 60 * 60 * 1000);
    const level = WELLBEING_LEVELS[offset % WELLBEING_LEVELS.length];
    const text = SAMPLE_TEXT[level];
    const timestamp = `${day.toISOString().slice(0, 10)} 21:00:00`;
    try {
      const scored = sentiment.classify(text);
      await diary.addEntryWithSentiment(userId, text, timestamp, scored.level, scored.polarity);
      created += 1;
    } catch (err) {
      if (!(err instanceof DuplicateEntryError)) {
        throw err;
      }
      skipped += 1;
    }
  }

  await new SummaryService(store).generateAllSummaries(userId);
  return { created, skipped };
}
