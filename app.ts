import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import type { AppConfig } from './config';
import type { UrlResolver } from './drive/resolver';
import { AuthError, errorMessage, NotFoundError, ValidationError } from './errors';
import type { Logger } from './logger';
import type { SyncHistory } from './services/history';
import { TtlCache } from './services/ttlCache';
import type { SyncJobs } from './sync/jobs';
import type { TransferHook } from './sync/transferHook';
import type { DirectUrl } from './types';
import { isValidPickcode, RECEIVE_CODE_LENGTH } from './utils/mediaUtils';

export interface AppContext {
  config: AppConfig;
  resolver: UrlResolver;
  jobs: SyncJobs;
  logger: Logger;
  history?: SyncHistory | null;
  /** Status of the incremental monitor, when one runs. */
  monitor?: { status(): object } | null;
  /** Set when transfer monitoring is enabled. */
  transfer?: TransferHook | null;
  redirectCache?: TtlCache<string, DirectUrl>;
}

const REDIRECT_CACHE_TTL_MS = 2 * 60 * 1000;
const REDIRECT_CACHE_CAPACITY = 64;

const httpStatusFor = (err: unknown): number => {
  if (err instanceof ValidationError) return 400;
  if (err instanceof NotFoundError) return 404;
  return 502;
};

/** Reads a string parameter from the query string, then from a form or JSON body. */
const param = (req: Request, name: string): string => {
  const fromQuery = req.query[name];
  if (typeof fromQuery === 'string') return fromQuery;
  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && name in body) {
    const value: unknown = Reflect.get(body, name);
    if (typeof value === 'string' || typeof value === 'number') return String(value);
  }
  return '';
};

export function createApp(ctx: AppContext): express.Express {
  const { config, resolver, jobs, logger } = ctx;
  const redirectCache =
    ctx.redirectCache ?? new TtlCache<string, DirectUrl>({ capacity: REDIRECT_CACHE_CAPACITY, ttlMs: REDIRECT_CACHE_TTL_MS });

  const app = express();
  app.set('trust proxy', 1);

  // --- LIMITERS ---
  const generalLimiter = rateLimit({ windowMs: 15 * 60 * 1000, max: 1000, message: { error: 'Too many requests.' } });
  const redirectLimiter = rateLimit({ windowMs: 60 * 1000, max: 600, message: 'Too many redirect requests.' });

  // --- MIDDLEWARE ---
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: false }));

  // --- AUTH ---
  const requireApiKey = async (req: Request, res: Response, next: NextFunction) => {
    if (param(req, 'apikey') !== config.apiKey) {
      if (config.authFailureDelayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, config.authFailureDelayMs));
      }
      res.status(401).type('text/plain').send('Unauthorized');
      return;
    }
    next();
  };

  // --- REDIRECT ---
  const resolveDirectUrl = async (req: Request): Promise<DirectUrl> => {
    const shareCode = param(req, 'share_code');
    const fileName = param(req, 'file_name');
    const app = param(req, 'app');

    if (shareCode) {
      const receiveCode = param(req, 'receive_code');
      if (receiveCode && receiveCode.length !== RECEIVE_CODE_LENGTH) {
        throw new ValidationError(`Bad receive_code: ${receiveCode}`);
      }
      const fileId = param(req, 'id');
      if (!fileId && !fileName) throw new ValidationError(`Please specify id or name: share_code=${shareCode}`);
      const key = JSON.stringify(['share', shareCode, receiveCode, fileId, fileName, app]);
      return redirectCache.getOrCompute(key, () =>
        resolver.resolveShare({ shareCode, receiveCode, fileId, fileName, app }),
      );
    }

    const pickcode = param(req, 'pickcode');
    if (!pickcode) throw new ValidationError('Missing pickcode parameter');
    if (!isValidPickcode(pickcode)) throw new ValidationError(`Bad pickcode: ${pickcode} ${fileName}`.trim());
    const userAgent = req.get('User-Agent') ?? '';
    logger.debug(`[Redirect] Client UA: ${userAgent}`);
    // Direct URLs are bound to the requesting client, so the UA is part of the key.
    const key = JSON.stringify(['pickcode', pickcode.toLowerCase(), fileName, app, userAgent]);
    return redirectCache.getOrCompute(key, () => resolver.resolvePickcode(pickcode, userAgent, app || undefined));
  };

  const redirectHandler = async (req: Request, res: Response) => {
    let direct: DirectUrl;
    try {
      direct = await resolveDirectUrl(req);
    } catch (err) {
      const status = httpStatusFor(err);
      const msg = errorMessage(err);
      if (status === 400) {
        logger.debug(`[Redirect] ${msg}`);
        res.status(status).type('text/plain').send(msg);
      } else {
        logger.error(`[Redirect] Failed to get download url: ${msg}`);
        const prefix = err instanceof AuthError ? 'Drive credentials rejected' : 'Failed to get download url';
        res.status(status).type('text/plain').send(`${prefix}: ${msg}`);
      }
      return;
    }

    logger.info(`[Redirect] Resolved ${direct.fileName || direct.pickcode || direct.fileId || ''}`);
    res
      .status(302)
      .set({
        Location: direct.url,
        'Content-Disposition': `attachment; filename="${encodeURIComponent(direct.fileName)}"`,
      })
      .type('application/json; charset=utf-8')
      .send(JSON.stringify({ status: 'redirecting', url: direct.url }));
  };

  app.route('/redirect_url')
    .get(redirectLimiter, requireApiKey, redirectHandler)
    .post(redirectLimiter, requireApiKey, redirectHandler);

  // --- OPERATOR API ---
  app.get('/api/ping', generalLimiter, requireApiKey, (req, res) => {
    res.json({ success: true, message: 'Pong' });
  });

  app.post('/api/sync/full', generalLimiter, requireApiKey, (req, res) => {
    if (jobs.isRunning('full')) return res.status(409).json({ error: 'Full sync already in progress.' });
    res.json({ success: true, message: 'Full sync started in background.' });
    jobs.runFull().catch((err) => logger.error(`[Jobs] ${errorMessage(err)}`));
  });

  app.post('/api/sync/share', generalLimiter, requireApiKey, (req, res) => {
    if (jobs.isRunning('share')) return res.status(409).json({ error: 'Share sync already in progress.' });
    res.json({ success: true, message: 'Share sync started in background.' });
    jobs.runShare().catch((err) => logger.error(`[Jobs] ${errorMessage(err)}`));
  });

  app.post('/api/transfer', generalLimiter, requireApiKey, async (req, res) => {
    if (!ctx.transfer) {
      res.status(503).json({ error: 'Transfer monitoring is disabled.' });
      return;
    }
    try {
      const outcome = await ctx.transfer.handle({ path: param(req, 'path'), pickcode: param(req, 'pickcode') });
      res.json({ success: true, ...outcome });
    } catch (err) {
      const msg = errorMessage(err);
      logger.error(`[Transfer] ${msg}`);
      res.status(err instanceof ValidationError ? 400 : 500).json({ error: msg });
    }
  });

  app.get('/api/sync/status', generalLimiter, requireApiKey, async (req, res) => {
    try {
      const history = ctx.history ? await ctx.history.recent(20) : [];
      res.json({
        full: jobs.status('full'),
        share: jobs.status('share'),
        monitor: ctx.monitor ? ctx.monitor.status() : null,
        history,
      });
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  return app;
}
