import type { Request, Response } from 'express';
import type { InMemoryStore } from './storage.js';
import { ONBOARDING_FUNNEL } from './types.js';
import { isObject, normalizeToArray, MAX_RETENTION_SEC } from './utils.js';

const DEFAULT_METRICS_WINDOW_SEC = 300;

const parseWindow = (raw: unknown, fallback: number): number | null => {
  if (raw === undefined) return fallback;
  const windowSec = typeof raw === 'string' ? Number(raw) : NaN;
  if (!Number.isInteger(windowSec) || windowSec <= 0 || windowSec > MAX_RETENTION_SEC) {
    return null;
  }
  return windowSec;
}

const parseSteps = (raw: unknown): string[] | null => {
  if (raw === undefined) return [...ONBOARDING_FUNNEL];
  if (typeof raw !== 'string') return null;
  const steps = raw.split(',').map((step) => step.trim()).filter(Boolean);
  return steps.length ? steps : null;
}

export class Controllers {
  constructor(private store: InMemoryStore) {}

  ingestEvents = withErrorHandling((req: Request, res: Response): void => {
    const events: unknown = req.body;
    if (!events) {
      res.status(400).json({ error: 'Missing events in request body' });
      return;
    }

    // Normalize to array format
    const eventsArray = normalizeToArray(events)
    if (!eventsArray) {
      res.status(400).json({
        error: 'Invalid events format',
        message: 'events must be an object or array of objects, got ' + typeof events
      });
      return;
    }

    const serverTimeSec = Math.floor(Date.now() / 1000)
    const results = eventsArray.map((candidate: unknown) => {
      try {
        const event = this.store.validateEvent(candidate, serverTimeSec);
        this.store.updateRingBuffer(event, serverTimeSec)
        return {
          event_id: event.event_id,
          status: 'success'
        }
      } catch (error) {
        return {
          event_id: isObject(candidate) && typeof candidate.event_id === 'string' ? candidate.event_id : 'event_unknown',
          status: 'error',
          message: (error as Error).message
        }
      }
    })

    res.status(200).json({ results });
  })

  getMetrics = withErrorHandling((req: Request, res: Response): void => {
    const windowSec = parseWindow(req.query.window, DEFAULT_METRICS_WINDOW_SEC);
    if (windowSec === null) {
      res.status(400).json({ error: 'Invalid window parameter' });
      return;
    }

    // Advance sliding window to current time before reading so stale buckets are cleared
    const now = Math.floor(Date.now() / 1000);
    this.store.advanceSlidingWindow(now);
    const lookbackWindow = this.store.getLookbackWindow(windowSec, now);

    const byEvent: Record<string, number> = {};
    const sessions = new Set<string>();
    let totalEvents = 0;

    for (const bucket of lookbackWindow) {
      totalEvents += bucket.events.length;
      for (const event of bucket.events) {
        byEvent[event.name] = (byEvent[event.name] ?? 0) + 1;
        sessions.add(event.session_id);
      }
    }

    res.status(200).json({
      window_sec: windowSec,
      events_per_sec: totalEvents / windowSec,
      total_events: totalEvents,
      unique_sessions: sessions.size,
      by_event: byEvent,
    });
  })

  getFunnel = withErrorHandling((req: Request, res: Response): void => {
    const windowSec = parseWindow(req.query.window, MAX_RETENTION_SEC);
    if (windowSec === null) {
      res.status(400).json({ error: 'Invalid window parameter' });
      return;
    }

    const steps = parseSteps(req.query.steps);
    if (!steps) {
      res.status(400).json({ error: 'Invalid steps parameter', message: 'steps must be a comma-separated list of event names' });
      return;
    }

    const now = Math.floor(Date.now() / 1000);
    this.store.advanceSlidingWindow(now);
    const lookbackWindow = this.store.getLookbackWindow(windowSec, now);

    res.status(200).json({
      window_sec: windowSec,
      steps: this.store.computeFunnel(steps, lookbackWindow),
    });
  })

  healthCheck = (_req: Request, res: Response): void => {
    res.status(200).json({ ok: true});
  }
}

type ControllerHandler = (req: Request, res: Response) => void;
const withErrorHandling = (handler: ControllerHandler): ControllerHandler => {
  return (req: Request, res: Response): void => {
    try {
      handler(req, res);
    } catch (error) {
      console.error('[collector] request failed', error);
      res.status(500).json({
        error: 'Internal server error',
        message: (error as Error).message
      });
    }
  };
};
