import Fastify from 'fastify';
import { z } from 'zod';
import { AppError } from './errors';
import { apiLogger } from './logger';
import { AuthService } from './services/authService';
import { DiaryService } from './services/diaryService';
import {
  OllamaClient,
  RecommendationService,
  type TextGenerator
} from './services/recommendationService';
import { SentimentService } from './services/sentimentService';
import { SettingsService } from './services/settingsService';
import { SummaryService } from './services/summaryService';
import { createStore, type DataStore, type StoreKind } from './store';

export interface BuildServerOptions {
  storage?: StoreKind;
  databaseUrl?: string;
  store?: DataStore;
  timeZone?: string;
  textGenerator?: TextGenerator;
}

function bearerToken(auth?: string): string | undefined {
  if (!auth) {
    return undefined;
  }
  const [type, token] = auth.split(' ');
  if (type !== 'Bearer') {
    return undefined;
  }
  return token;
}

const yearSchema = z.coerce.number().int().min(1970).max(9999);
const monthSchema = z.coerce.number().int().min(1).max(12);

export function buildServer(options: BuildServerOptions = {}) {
  const storage =
    options.storage ?? (process.env.STORAGE_DRIVER === 'memory' ? 'memory' : 'postgres');
  const databaseUrl = options.databaseUrl ?? process.env.DATABASE_URL;
  const timeZone = options.timeZone ?? (process.env.DIARY_TIME_ZONE || undefined);
  const startedAt = Date.now();

  const app = Fastify({ logger: false });
  const store = options.store ?? createStore({ kind: storage, databaseUrl });
  const textGenerator =
    options.textGenerator ??
    new OllamaClient({
      baseUrl: process.env.OLLAMA_URL || 'http://localhost:11434',
      model: process.env.OLLAMA_MODEL || 'mistral',
      timeoutMs: Number(process.env.RECOMMENDATION_TIMEOUT_MS || 20_000)
    });

  const sentimentService = new SentimentService();
  const diaryService = new DiaryService(store, sentimentService, timeZone);
  const summaryService = new SummaryService(store, timeZone);
  const settingsService = new SettingsService(store);
  const authService = new AuthService(store, settingsService, summaryService);
  const recommendationService = new RecommendationService(textGenerator);

  app.addHook('onReady', async () => {
    await store.init();
  });

  app.addHook('onClose', async () => {
    await store.close();
  });

  const requireUser = async (request: {
    headers: Record<string, string | string[] | undefined>;
  }) => {
    const token = bearerToken(String(request.headers.authorization ?? ''));
    return authService.getUserBySessionToken(token);
  };

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      reply.status(error.status).send({
        code: error.code,
        message: error.message,
        details: error.details ?? null
      });
      return;
    }

    if (error instanceof z.ZodError) {
      reply.status(400).send({
        code: 40000,
        message: 'Invalid request parameters',
        details: { issues: error.issues }
      });
      return;
    }

    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({ code: 40000, message: error.message });
      return;
    }

    apiLogger.error({ err: error, method: request.method, url: request.url }, 'Unhandled error');
    reply.status(500).send({
      code: 50000,
      message: 'Internal server error'
    });
  });

  app.get('/healthz', async () => ({
    code: 0,
    message: 'ok',
    data: { status: 'ok', uptime_sec: Math.round((Date.now() - startedAt) / 1000) }
  }));

  app.get('/readyz', async () => ({ code: 0, message: 'ok', data: { status: 'ready' } }));

  app.post('/v1/auth/signup', async (request) => {
    const body = z
      .object({
        username: z.string().min(1),
        password: z.string().min(1),
        confirm_password: z.string()
      })
      .parse(request.body);
    const result = await authService.signup({
      username: body.username,
      password: body.password,
      confirmPassword: body.confirm_password
    });
    return {
      code: 0,
      message: `Account successfully created for ${result.user.username}!`,
      data: {
        user_id: result.user.id,
        username: result.user.username,
        session_token: result.sessionToken,
        timer_length: result.settings.timerLength
      }
    };
  });

  app.post('/v1/auth/login', async (request) => {
    const body = z
      .object({
        username: z.string().min(1),
        password: z.string().min(1)
      })
      .parse(request.body);
    const result = await authService.login(body);
    return {
      code: 0,
      message: `Welcome, ${result.user.username}!`,
      data: {
        user_id: result.user.id,
        username: result.user.username,
        session_token: result.sessionToken,
        timer_length: result.settings.timerLength
      }
    };
  });

  app.post('/v1/diary', async (request) => {
    const user = await requireUser(request);
    const body = z.object({ text: z.string() }).parse(request.body);
    const entry = await diaryService.submit(user.id, body.text);
    return { code: 0, message: 'ok', data: entry };
  });

  app.get('/v1/diary', async (request) => {
    const user = await requireUser(request);
    const entries = await diaryService.getEntries(user.id);
    return { code: 0, message: 'ok', data: entries };
  });

  const selectedMonthSchema = z.object({
    year: yearSchema.optional(),
    month: monthSchema.optional()
  });

  app.get('/v1/summaries/current', async (request) => {
    const user = await requireUser(request);
    const query = selectedMonthSchema.parse(request.query);
    const overview = await summaryService.getMonthOverview(user.id, query);
    return { code: 0, message: 'ok', data: overview };
  });

  app.get('/v1/summaries/current/recommendation', async (request, reply) => {
    const user = await requireUser(request);
    const query = selectedMonthSchema.parse(request.query);
    const overview = await summaryService.getMonthOverview(user.id, query);
    // A client that disconnects first abandons the generation; its result goes nowhere.
    const controller = new AbortController();
    reply.raw.once('close', () => controller.abort());
    const recommendation = await recommendationService.recommend(
      overview.stats,
      controller.signal
    );
    return { code: 0, message: 'ok', data: recommendation };
  });

  app.get('/v1/summaries', async (request) => {
    const user = await requireUser(request);
    const summaries = await summaryService.listSummaries(user.id);
    return { code: 0, message: 'ok', data: summaries };
  });

  app.post('/v1/summaries/generate', async (request) => {
    const user = await requireUser(request);
    const months = await summaryService.generateAllSummaries(user.id);
    return { code: 0, message: 'ok', data: { months } };
  });

  app.get('/v1/summaries/:year/:month', async (request) => {
    const user = await requireUser(request);
    const params = z.object({ year: yearSchema, month: monthSchema }).parse(request.params);
    const summary = await summaryService.getSummary(user.id, params.year, params.month);
    return { code: 0, message: 'ok', data: summary };
  });

  app.get('/v1/settings', async (request) => {
    const user = await requireUser(request);
    const settings = await settingsService.get(user.id);
    return { code: 0, message: 'ok', data: settings };
  });

  app.patch('/v1/settings', async (request) => {
    const user = await requireUser(request);
    const body = z.object({ timer_length: z.number() }).parse(request.body);
    const settings = await settingsService.setTimerLength(user.id, body.timer_length);
    return {
      code: 0,
      message: `Timer set to ${settings.timerLength} seconds`,
      data: settings
    };
  });

  return app;
}
