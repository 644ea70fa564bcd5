import { Hono, type Context } from 'hono';
import { z } from 'zod';
import { isRating, type Rating } from '@vocab-drill/shared/scheduler';
import {
  ValidationError,
  correctionFrom,
  isEngineError,
  type EngineErrorKind,
  type StudyEngine,
} from '@vocab-drill/engine';
import { authMiddleware } from './middleware/auth';

export interface AppDeps {
  engine: StudyEngine;
  // Called after every successful mutating request
  persist?: () => Promise<void>;
}

const STATUS_BY_KIND = {
  not_found: 404,
  conflict: 409,
  auth_required: 401,
  validation: 400,
  transient: 503,
} as const satisfies Record<EngineErrorKind, number>;

// ============ Request bodies ============

const optionalText = z.string().nullish();

const NewWordBody = z.object({
  text: z.string(),
  translation: optionalText,
  language: z.enum(['Dutch', 'English']).optional(),
  chapter: optionalText,
  group_name: optionalText,
  sentence: optionalText,
});

const GradeBody = z.object({
  card_id: z.string().min(1),
  rating: z.custom<Rating>(isRating, 'rating must be 0, 1, 2 or 3'),
});

const CorrectionBody = z
  .object({
    text: z.string().optional(),
    translation: z.string().optional(),
  })
  .strict();

const IssueBody = z.object({
  card_id: z.string().min(1),
  word_id: z.string().min(1).optional(),
  note: optionalText,
  reported_at: z.string().optional(),
});

const OcrImportBody = z.object({
  chapter: z.string(),
  language: z.enum(['Dutch', 'English']).optional(),
  initial_group: optionalText,
  min_confidence: z.number().min(0).max(1).optional(),
  lines: z.array(
    z.object({
      text: z.string(),
      bbox: z.object({ x: z.number(), y: z.number(), w: z.number(), h: z.number() }),
      confidence: z.number().optional(),
    })
  ),
});

async function readJSON(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch (error) {
    console.warn('[server] unreadable request body:', error instanceof Error ? error.message : error);
    throw new ValidationError('Request body must be JSON');
  }
}

async function parseBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.output<T>> {
  const result = schema.safeParse(await readJSON(c));
  if (!result.success) {
    throw new ValidationError(
      'Invalid request body',
      result.error.issues.map(issue => `${issue.path.join('.') || '(body)'}: ${issue.message}`)
    );
  }
  return result.data;
}

export function createApp({ engine, persist }: AppDeps) {
  const app = new Hono();

  app.use('/api/*', authMiddleware);

  // Save the store once a mutation has gone through
  app.use('/api/*', async (c, next) => {
    await next();
    if (persist && c.req.method !== 'GET' && c.res.status < 400) {
      await persist();
    }
  });

  app.onError((err, c) => {
    if (isEngineError(err)) {
      const body: { error: string; kind: EngineErrorKind; issues?: string[] } = {
        error: err.message,
        kind: err.kind,
      };
      if (err instanceof ValidationError && err.issues.length > 0) {
        body.issues = err.issues;
      }
      return c.json(body, STATUS_BY_KIND[err.kind]);
    }
    console.error('[server] unhandled error:', err);
    return c.json({ error: 'Internal server error' }, 500);
  });

  // Health check
  app.get('/api/health', async (c) => c.json({ status: 'ok', ...(await engine.stats()) }));

  app.get('/api/counts', async (c) => c.json(await engine.counts()));

  app.get('/api/chapters', async (c) => c.json({ chapters: await engine.listChapters() }));

  // ============ Session ============

  app.get('/api/session', (c) => c.json(engine.sessionState()));

  app.post('/api/session/start', async (c) => c.json(await engine.startSession()));

  app.post('/api/session/end', (c) => c.json(engine.endSession()));

  app.get('/api/session/next', async (c) => {
    const next = await engine.nextDueCard();
    return c.json({ ...(next ?? { card: null, previews: [] }), session: engine.sessionState() });
  });

  app.post('/api/session/grade', async (c) => {
    const { card_id, rating } = await parseBody(c, GradeBody);
    const card = await engine.gradeCard(card_id, rating);
    return c.json({ card, session: engine.sessionState() });
  });

  // ============ Words ============

  app.post('/api/words', async (c) => {
    const body = await parseBody(c, NewWordBody);
    return c.json(await engine.addWord(body), 201);
  });

  app.delete('/api/words/:id', async (c) => {
    const id = c.req.param('id');
    await engine.deleteWord(id, c.req.query('confirm') === 'true');
    return c.json({ deleted: id });
  });

  app.delete('/api/words', async (c) => {
    await engine.deleteAll(c.req.query('confirm') === 'true');
    return c.json({ deleted: 'all' });
  });

  app.post('/api/words/:id/correction', async (c) => {
    const body = await parseBody(c, CorrectionBody);
    return c.json(await engine.applyCorrectionLocal(c.req.param('id'), correctionFrom(body)));
  });

  app.post('/api/words/:id/correction/push', async (c) => {
    const body = await parseBody(c, CorrectionBody);
    return c.json(await engine.pushCorrection(c.get('auth'), c.req.param('id'), correctionFrom(body)));
  });

  app.get('/api/cards/:id/reviews', async (c) => {
    return c.json({ reviews: await engine.reviewsFor(c.req.param('id')) });
  });

  app.post('/api/issues', async (c) => {
    const { card_id, word_id, note, reported_at } = await parseBody(c, IssueBody);
    return c.json(await engine.reportIssue(card_id, note, { wordId: word_id, reportedAt: reported_at }), 201);
  });

  // ============ Sync & import ============

  app.post('/api/sync/refresh', async (c) => {
    const snapshot = await readJSON(c);
    return c.json(await engine.refreshFromDataApi(c.get('auth'), snapshot));
  });

  app.post('/api/sync/pull', async (c) => c.json(await engine.pullFromDataApi(c.get('auth'))));

  app.post('/api/import/ocr', async (c) => {
    const body = await parseBody(c, OcrImportBody);
    const result = await engine.importFromOcr({
      lines: body.lines,
      chapter: body.chapter,
      language: body.language,
      initialGroup: body.initial_group,
      minConfidence: body.min_confidence,
    });
    return c.json(result, 201);
  });

  return app;
}
