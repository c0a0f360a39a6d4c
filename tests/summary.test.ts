import { afterEach, describe, expect, it, vi } from 'vitest';
import { AppError } from '../src/errors';
import { DiaryService } from '../src/services/diaryService';
import { SentimentService } from '../src/services/sentimentService';
import { computeMonthStats, emptyCounts, SummaryService } from '../src/services/summaryService';
import { InMemoryStore } from '../src/store';
import type { DiaryEntry, WellbeingLevel } from '../src/types';

function entry(
  id: number,
  timestamp: string,
  wellbeingLevel: WellbeingLevel | null,
  polarity: number | null
): DiaryEntry {
  return {
    id,
    userId: 'usr_1',
    text: `entry ${id}`,
    timestamp,
    date: timestamp.slice(0, 10),
    wellbeingLevel,
    polarity
  };
}

describe('computeMonthStats', () => {
  it('returns zero counts and no happiest day for an empty month', () => {
    expect(computeMonthStats([])).toEqual({
      counts: emptyCounts(),
      avgPolarity: 0,
      happiestDay: null,
      happiestEntry: null
    });
  });

  it('keeps the earliest of two equally happy days', () => {
    const entries = [
      entry(1, '2025-09-01 09:00:00', 'very happy', 0.9),
      entry(2, '2025-09-02 09:00:00', 'very sad', -0.9),
      entry(3, '2025-09-03 09:00:00', 'very happy', 0.9)
    ];

    const stats = computeMonthStats(entries);
    expect(stats.counts).toEqual({ verySad: 1, sad: 0, normal: 0, happy: 0, veryHappy: 2 });
    expect(stats.avgPolarity).toBeCloseTo(0.3, 10);
    expect(stats.happiestDay).toBe('2025-09-01 09:00:00');
    expect(stats.happiestEntry).toBe('entry 1');

    expect(computeMonthStats(entries.slice().reverse()).happiestDay).toBe('2025-09-01 09:00:00');
  });

  it('counts unscored entries but leaves them out of the average', () => {
    const stats = computeMonthStats([
      entry(1, '2025-09-01 09:00:00', 'happy', null),
      entry(2, '2025-09-02 09:00:00', 'sad', -0.4),
      entry(3, '2025-09-03 09:00:00', null, null)
    ]);
    expect(stats.counts).toEqual({ verySad: 0, sad: 1, normal: 0, happy: 1, veryHappy: 0 });
    expect(stats.avgPolarity).toBe(-0.4);
    expect(stats.happiestDay).toBe('2025-09-02 09:00:00');
  });

  it('has no happiest day when nothing is scored', () => {
    const stats = computeMonthStats([entry(1, '2025-09-01 09:00:00', 'normal', null)]);
    expect(stats.avgPolarity).toBe(0);
    expect(stats.happiestDay).toBeNull();
    expect(stats.happiestEntry).toBeNull();
  });
});

describe('monthly summaries', () => {
  const sentiment = new SentimentService();

  afterEach(() => {
    vi.useRealTimers();
  });

  async function write(store: InMemoryStore, timestamp: string, text: string) {
    const diary = new DiaryService(store, sentiment);
    const { level, polarity } = sentiment.classify(text);
    await diary.addEntryWithSentiment('usr_1', text, timestamp, level, polarity);
  }

  it('produces identical rows when regenerated without new entries', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2025-12-01T10:00:00.000Z'));
    const store = new InMemoryStore();
    await write(store, '2025-09-01 08:00:00', 'Today was amazing and wonderful!');
    await write(store, '2025-09-02 08:00:00', 'I feel miserable and hopeless.');
    await write(store, '2025-10-05 08:00:00', 'It was an okay day.');
    const service = new SummaryService(store);

    expect(await service.generateAllSummaries('usr_1')).toBe(2);
    const first = await service.listSummaries('usr_1');
    expect(await service.generateAllSummaries('usr_1')).toBe(2);
    const second = await service.listSummaries('usr_1');

    expect(second).toEqual(first);
    expect(first[1]).toEqual({
      userId: 'usr_1',
      year: 2025,
      month: 9,
      stats: {
        counts: { verySad: 1, sad: 0, normal: 0, happy: 0, veryHappy: 1 },
        avgPolarity: 0,
        happiestDay: '2025-09-01 08:00:00',
        happiestEntry: 'Today was amazing and wonderful!'
      },
      generatedAt: '2025-12-01T10:00:00.000Z'
    });
  });

  it('replaces a month on regeneration instead of adding to it', async () => {
    const store = new InMemoryStore();
    const service = new SummaryService(store);
    await write(store, '2025-09-01 08:00:00', 'It was an okay day.');
    await service.generateAllSummaries('usr_1');
    await write(store, '2025-09-02 08:00:00', 'I feel happy and grateful.');
    await service.generateAllSummaries('usr_1');

    const summary = await service.getSummary('usr_1', 2025, 9);
    expect(summary.stats.counts).toEqual({ verySad: 0, sad: 0, normal: 1, happy: 1, veryHappy: 0 });
    expect(summary.stats.happiestEntry).toBe('I feel happy and grateful.');
  });

  it('lists the most recent month first', async () => {
    const store = new InMemoryStore();
    const service = new SummaryService(store);
    await write(store, '2025-09-05 08:00:00', 'It was an okay day.');
    await write(store, '2025-11-01 08:00:00', 'It was an okay day.');
    await write(store, '2025-10-10 08:00:00', 'It was an okay day.');
    await service.generateAllSummaries('usr_1');

    const months = (await service.listSummaries('usr_1')).map(({ year, month }) => [year, month]);
    expect(months).toEqual([
      [2025, 11],
      [2025, 10],
      [2025, 9]
    ]);
  });

  it('does nothing for a user without entries', async () => {
    const service = new SummaryService(new InMemoryStore());
    expect(await service.generateAllSummaries('usr_1')).toBe(0);
    expect(await service.listSummaries('usr_1')).toEqual([]);
    await expect(service.getSummary('usr_1', 2025, 9)).rejects.toMatchObject({
      status: 404,
      code: 40402
    });
  });

  it('computes the overview of the current month in the configured zone', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2025-09-30T23:30:00.000Z'));
    const store = new InMemoryStore();
    await write(store, '2025-10-01 07:00:00', 'Today was amazing and wonderful!');

    const tokyo = new SummaryService(store, 'Asia/Tokyo');
    const overview = await tokyo.getMonthOverview('usr_1');
    expect(overview.year).toBe(2025);
    expect(overview.month).toBe(10);
    expect(overview.entryCount).toBe(1);

    const utc = new SummaryService(store, 'UTC');
    const missing = utc.getMonthOverview('usr_1');
    await expect(missing).rejects.toBeInstanceOf(AppError);
    await expect(missing).rejects.toMatchObject({
      code: 40401,
      message: 'No diary entries found for 2025-09.'
    });
  });
});
