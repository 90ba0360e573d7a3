import { randomUUID } from 'crypto';
import { NextResponse } from 'next/server';
import { getScanContext, type ScanContext } from '../context';
import { ForbiddenError, RateLimitError, errorMessage, toHttpStatus } from '../errors';
import type { AppConfig } from '../config';

export type RouteParams = Record<string, string | string[]>;

/** A route's logic, given the shared scan context and its dynamic segments. */
export type ApiHandler<P extends RouteParams = RouteParams> = (req: Request, ctx: ScanContext, params: Partial<P>) => Promise<Response>;

/** Signature Next.js calls a route export with. */
export type RouteHandler<P extends RouteParams = RouteParams> = (req: Request, route?: { params: P }) => Promise<Response>;

export function errorResponse(err: unknown): Response {
  return NextResponse.json({ error: errorMessage(err) }, { status: toHttpStatus(err) });
}

function applyHeaders(headers: Headers, config: AppConfig): void {
  headers.set('X-Content-Type-Options', 'nosniff');
  headers.set('X-Frame-Options', 'DENY');
  headers.set('X-XSS-Protection', '1; mode=block');
  if (config.security.enableCors) {
    headers.set('Access-Control-Allow-Origin', '*');
    headers.set('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    headers.set('Access-Control-Allow-Headers', 'Content-Type, Authorization');
  }
}

function isBlockedAgent(userAgent: string, blocked: readonly string[]): boolean {
  const ua = userAgent.toLowerCase();
  return blocked.some((b) => b && ua.includes(b.toLowerCase()));
}

function clientIp(req: Request): string {
  return req.headers.get('x-forwarded-for')?.split(',')[0]?.trim() || req.headers.get('x-real-ip') || 'unknown';
}

/**
 * Wrap a route handler with the checks every API call passes through, in
 * order: rate limiter (429), blocked user agents (403), request counter.
 * Security and CORS headers are set on every response, errors thrown by the
 * handler become JSON `{ error }` responses, and each call is logged once.
 */
export function withApi<P extends RouteParams = RouteParams>(
  handler: ApiHandler<P>,
  getContext: () => ScanContext = getScanContext,
): RouteHandler<P> {
  return async (req, route) => {
    const ctx = getContext();
    const requestId = randomUUID();
    const started = Date.now();
    const { pathname } = new URL(req.url);
    const log = ctx.logger.child({ requestId });

    let res: Response;
    if (!(await ctx.limiter.acquire())) {
      ctx.stats.incRateLimited();
      res = errorResponse(new RateLimitError());
    } else if (isBlockedAgent(req.headers.get('user-agent') ?? '', ctx.config.security.blockedUserAgents)) {
      res = errorResponse(new ForbiddenError('Blocked user agent'));
    } else {
      ctx.stats.incRequests();
      try {
        const params: Partial<P> = route?.params ?? {};
        res = await handler(req, ctx, params);
      } catch (err) {
        res = errorResponse(err);
        if (res.status >= 500) log.error({ err, path: pathname }, 'unhandled API error');
      }
    }

    applyHeaders(res.headers, ctx.config);
    log.info(
      { method: req.method, path: pathname, status: res.status, durationMs: Date.now() - started, ip: clientIp(req) },
      'api request',
    );
    return res;
  };
}

/** CORS preflight. Answered without a rate-limit token. */
export function preflight(getContext: () => ScanContext = getScanContext): () => Promise<Response> {
  return async () => {
    const res = new Response(null, { status: 204 });
    applyHeaders(res.headers, getContext().config);
    return res;
  };
}
