import { AppError } from '../errors';
import type { DataStore } from '../store';
import type { UserSettings } from '../types';

export const DEFAULT_TIMER_LENGTH = 30 * 60;
export const MIN_TIMER_LENGTH = 20;
export const MAX_TIMER_LENGTH = 30 * 60;

export class SettingsService {
  constructor(private readonly store: DataStore) {}

  async ensure(userId: string): Promise<UserSettings> {
    return this.store.ensureSettings(userId, DEFAULT_TIMER_LENGTH);
  }

  async get(userId: string): Promise<UserSettings> {
    return (await this.store.getSettings(userId)) ?? this.ensure(userId);
  }

  async setTimerLength(userId: string, seconds: number): Promise<UserSettings> {
    if (!Number.isInteger(seconds) || seconds < MIN_TIMER_LENGTH || seconds > MAX_TIMER_LENGTH) {
      throw new AppError(
        422,
        42201,
        `Session length must be between ${MIN_TIMER_LENGTH} and ${MAX_TIMER_LENGTH} seconds`,
        { min: MIN_TIMER_LENGTH, max: MAX_TIMER_LENGTH }
      );
    }
    return this.store.setTimerLength(userId, seconds);
  }
}
