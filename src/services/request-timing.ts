import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { LogShipper } from './log-shipper.js';
import type { LogEvent } from './log-record.js';

export interface RequestTimingOptions {
  // Request paths that produce no record, e.g. health probes
  ignorePaths?: string[];
  labels?: Record<string, string>;
}

export interface RequestTiming {
  method: string;
  url: string;
  statusCode: number;
  durationSeconds: number;
  clientIp: string;
  userAgent: string;
  finishedAt: Date;
}

export function buildRequestEvent(timing: RequestTiming, extraLabels?: Record<string, string>): LogEvent {
  const { method, url, statusCode, durationSeconds, clientIp, userAgent } = timing;

  return {
    timestamp: timing.finishedAt,
    message: `${method} ${url} - ${statusCode} - ${durationSeconds.toFixed(3)}s`,
    level: statusCode >= 500 ? 'ERROR' : statusCode >= 400 ? 'WARN' : 'INFO',
    logger: 'http',
    fields: {
      http_method: method,
      http_url: url,
      http_status_code: statusCode,
      http_duration: durationSeconds,
      client_ip: clientIp,
      user_agent: userAgent
    },
    labels: {
      ...extraLabels,
      log_type: 'http_request',
      method,
      status_code: String(statusCode)
    }
  };
}

/**
 * Express middleware that emits one `log_type=http_request` record per
 * finished response. The record is handed off after the response is written.
 */
export function requestTimingMiddleware(shipper: LogShipper, options: RequestTimingOptions = {}): RequestHandler {
  const ignored = new Set(options.ignorePaths ?? []);

  return (req: Request, res: Response, next: NextFunction): void => {
    if (ignored.has(req.path)) {
      next();
      return;
    }

    const startedAt = process.hrtime.bigint();
    const method = req.method;
    const url = `${req.protocol}://${req.get('host') ?? 'unknown'}${req.originalUrl}`;
    const clientIp = req.ip ?? req.socket.remoteAddress ?? 'unknown';
    const userAgent = req.get('user-agent') ?? 'unknown';

    res.once('finish', () => {
      const durationSeconds = Number(process.hrtime.bigint() - startedAt) / 1e9;
      shipper.emitAsync(
        buildRequestEvent(
          {
            method,
            url,
            statusCode: res.statusCode,
            durationSeconds,
            clientIp,
            userAgent,
            finishedAt: new Date()
          },
          options.labels
        )
      );
    });

    next();
  };
}
