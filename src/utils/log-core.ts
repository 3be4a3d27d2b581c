/**
 * Shared Pino-based logging core.
 * Single source of truth for LOG_LEVEL, LOG_FORMAT and TRANSPORT_TYPE.
 */

import pino from 'pino';
import type { Request, Response } from 'express';
import { Writable } from 'stream';
import { LOG_LEVEL, LOG_FORMAT, getTransportType, type TransportType } from '../config.js';

const REDACT_PATHS = [
  'req.headers.authorization',
  '*.password',
  '*.secret',
  '*.apiKey',
  'req.headers.cookie'
];

/**
 * Renders one pino JSON line as `[HH:MM:SS] [LEVEL  ] message`.
 * Lines that are not JSON pass through unchanged.
 */
export function formatTextLine(line: string): string | null {
  if (!line.trim()) return null;
  try {
    const data: unknown = JSON.parse(line);
    if (typeof data !== 'object' || data === null) return line.endsWith('\n') ? line : line + '\n';
    const record = new Map(Object.entries(data));
    const rawTime = record.get('time');
    const time = typeof rawTime === 'string' ? rawTime.slice(11, 19) : '00:00:00';
    const rawLevel = record.get('level');
    const level = (typeof rawLevel === 'string' ? rawLevel : pino.levels.labels[Number(rawLevel)] ?? 'info')
      .toUpperCase()
      .padEnd(7);
    const msg = String(record.get('msg') ?? '');
    return `[${time}] [${level}] ${msg}\n`;
  } catch {
    return line.endsWith('\n') ? line : line + '\n';
  }
}

function textFormatStream(transportType: TransportType): Writable {
  const out = transportType === 'stdio' ? process.stderr : process.stdout;
  return new Writable({
    write(chunk: Buffer, _enc, cb) {
      for (const line of chunk.toString().split('\n')) {
        const formatted = formatTextLine(line);
        if (formatted) out.write(formatted);
      }
      cb();
    }
  });
}

function createBaseLogger(): pino.Logger {
  // Read at creation time so a CLI flag can still pick the transport.
  const transportType = getTransportType();
  const dest = LOG_FORMAT === 'text'
    ? textFormatStream(transportType)
    : transportType === 'stdio'
      ? process.stderr
      : process.stdout;

  return pino({
    level: LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    serializers: {
      req(req: Request) {
        return {
          method: req.method,
          url: req.url,
          headers: {
            'user-agent': req.headers['user-agent'],
            'x-request-id': req.headers['x-request-id']
          }
        };
      },
      res(res: Response) {
        return { statusCode: res.statusCode };
      }
    }
  }, dest);
}

let baseLoggerInstance: pino.Logger | null = null;

/**
 * Returns the shared Pino logger. Creates it on first call.
 */
export function getBaseLogger(): pino.Logger {
  if (!baseLoggerInstance) {
    baseLoggerInstance = createBaseLogger();
  }
  return baseLoggerInstance;
}
