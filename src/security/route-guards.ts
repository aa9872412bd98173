// Optional API token auth and fixed-window rate limiting for the HTTP routes
// Both read env on every request.
// Client addresses come from request.ip; set TRUST_PROXY when a reverse proxy sits in front.

import crypto from 'crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { env } from '../env.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';

interface RateWindow {
  count: number;
  resetAt: number;
}

const windows = new Map<string, RateWindow>();
const SWEEP_ABOVE = 5000;

function sha256(value: string): Buffer {
  return crypto.createHash('sha256').update(value).digest();
}

function firstHeader(value: string | string[] | undefined): string {
  return (Array.isArray(value) ? value[0] ?? '' : value ?? '').trim();
}

/** `x-api-token`, else a `Bearer` authorization header. */
export function extractAuthToken(request: FastifyRequest): string {
  const direct = firstHeader(request.headers['x-api-token']);
  if (direct) return direct;

  const match = /^Bearer\s+(\S+)$/i.exec(firstHeader(request.headers.authorization));
  return match ? match[1] : '';
}

function deny(reply: FastifyReply, error: AppError): false {
  reply.code(error.statusCode).send(formatErrorResponse(error));
  return false;
}

export function requireAuthIfEnabled(request: FastifyRequest, reply: FastifyReply): boolean {
  if (!env.AUTH_ENFORCEMENT_ENABLED) return true;

  const token = extractAuthToken(request);
  if (!token) return deny(reply, AppError.unauthorized('Missing API token'));

  // Without a configured API_TOKEN any token passes (an authenticating proxy checks it)
  if (env.API_TOKEN && !crypto.timingSafeEqual(sha256(token), sha256(env.API_TOKEN))) {
    return deny(reply, AppError.unauthorized('Invalid API token'));
  }
  return true;
}

function clientKey(request: FastifyRequest): string {
  const token = extractAuthToken(request);
  return token ? `token:${sha256(token).toString('hex').slice(0, 16)}` : `ip:${request.ip}`;
}

export interface RateLimitOptions {
  routeKey: string;
  maxRequests: number;
}

export function enforceRateLimitIfEnabled(
  request: FastifyRequest,
  reply: FastifyReply,
  options: RateLimitOptions,
): boolean {
  if (!env.RATE_LIMITING_ENABLED) return true;

  const now = Date.now();
  if (windows.size >= SWEEP_ABOVE) {
    for (const [key, entry] of windows) {
      if (entry.resetAt <= now) windows.delete(key);
    }
  }

  const key = `${options.routeKey}:${clientKey(request)}`;
  const current = windows.get(key);
  if (!current || current.resetAt <= now) {
    windows.set(key, { count: 1, resetAt: now + env.RATE_LIMIT_WINDOW_MS });
    return true;
  }

  if (current.count >= options.maxRequests) {
    const retryAfterSeconds = Math.max(1, Math.ceil((current.resetAt - now) / 1000));
    reply.header('Retry-After', String(retryAfterSeconds));
    return deny(reply, AppError.rateLimited(retryAfterSeconds, 'Too many requests. Please try again later.'));
  }

  current.count += 1;
  return true;
}

export function resetRateLimits(): void {
  windows.clear();
}
