import { AppError, UnauthenticatedError } from '../errors';
import type { DataStore } from '../store';
import type { User, UserSettings } from '../types';
import { hashPassword, now, randomToken, toIso, verifyPassword } from '../utils';
import { DEFAULT_TIMER_LENGTH, type SettingsService } from './settingsService';
import type { SummaryService } from './summaryService';

const USERNAME_PATTERN = /^[A-Za-z0-9_.-]{3,32}$/;

export interface AuthResult {
  user: User;
  sessionToken: string;
  settings: UserSettings;
}

export class AuthService {
  constructor(
    private readonly store: DataStore,
    private readonly settingsService: SettingsService,
    private readonly summaryService: SummaryService
  ) {}

  async signup(params: {
    username: string;
    password: string;
    confirmPassword: string;
  }): Promise<AuthResult> {
    const username = params.username.trim();
    if (!USERNAME_PATTERN.test(username)) {
      throw new AppError(
        400,
        40005,
        'Username must be 3-32 characters of letters, digits, dot, dash or underscore'
      );
    }
    this.validatePassword(params.password);
    if (params.password !== params.confirmPassword) {
      throw new AppError(400, 40006, 'Passwords do not match.');
    }

    const user: User = {
      id: randomToken('usr'),
      username,
      passwordHash: hashPassword(params.password),
      createdAt: toIso(now())
    };
    const created = await this.store.createUserWithSettings(user, DEFAULT_TIMER_LENGTH);
    if (!created) {
      throw new AppError(409, 40902, 'Username already exists. Please choose another.');
    }

    await this.summaryService.generateAllSummaries(user.id);
    const sessionToken = await this.openSession(user.id);
    return { user, sessionToken, settings: { userId: user.id, timerLength: DEFAULT_TIMER_LENGTH } };
  }

  async login(params: { username: string; password: string }): Promise<AuthResult> {
    const user = await this.store.getUserByUsername(params.username.trim());
    if (!user || !verifyPassword(params.password, user.passwordHash)) {
      throw new AppError(401, 40102, 'Invalid username or password');
    }

    const settings = await this.settingsService.ensure(user.id);
    await this.summaryService.generateAllSummaries(user.id);
    const sessionToken = await this.openSession(user.id);
    return { user, sessionToken, settings };
  }

  async getUserBySessionToken(token?: string): Promise<User> {
    if (!token) {
      throw new UnauthenticatedError();
    }
    const session = await this.store.getSession(token);
    if (!session) {
      throw new UnauthenticatedError();
    }
    const user = await this.store.getUserById(session.userId);
    if (!user) {
      throw new UnauthenticatedError();
    }
    return user;
  }

  private async openSession(userId: string): Promise<string> {
    const token = randomToken('sess');
    await this.store.createSession({ token, userId, createdAt: toIso(now()) });
    return token;
  }

  private validatePassword(password: string): void {
    if (password.length < 6 || password.length > 64) {
      throw new AppError(400, 40003, 'Password must be 6-64 characters long');
    }
  }
}
