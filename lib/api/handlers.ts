import { NextResponse } from 'next/server';
import pkg from '../../package.json';
import { describeConfig, type ScanContext } from '../context';
import { ForbiddenError, InputError, NotFoundError, errorMessage } from '../errors';
import { isAllowedDomain, normalizeDomain, parseTarget } from '../subdomain';
import { getSource, isSourceId } from '../sources';
import { publishJob, SSE_HEADERS } from '../stream/publisher';
import { probeWithFallback } from '../probe';
import { categorySizes } from '../wordlists';
import type { ApiHandler } from './middleware';

function requireAllowed(ctx: ScanContext, host: string): void {
  if (!isAllowedDomain(host, ctx.config.security.allowedDomains)) {
    throw new ForbiddenError(`domain ${host} not in allowed list`);
  }
}

function targetParam(req: Request): string {
  return parseTarget(new URL(req.url).searchParams.get('target'));
}

/** GET /api/{source}/stream?target= */
export const streamHandler: ApiHandler<{ source: string }> = async (req, ctx, params) => {
  const source = typeof params.source === 'string' ? params.source : '';
  if (!isSourceId(source)) {
    throw new InputError(`unknown source: ${source || '(none)'}`);
  }
  const target = targetParam(req);
  requireAllowed(ctx, target);

  const definition = getSource(source);
  const job = ctx.registry.register(target, source, definition.timeoutMs(ctx.config));
  req.signal.addEventListener('abort', () => job.cancel('client'), { once: true });
  return new Response(publishJob(job, definition, ctx), { headers: SSE_HEADERS });
};

/** GET /api/probe?url= */
export const probeHandler: ApiHandler = async (req, ctx) => {
  const raw = new URL(req.url).searchParams.get('url')?.trim();
  if (!raw) throw new InputError('missing url parameter');

  if (ctx.config.security.allowedDomains.length > 0) {
    let host: string;
    try {
      host = normalizeDomain(raw);
    } catch (err) {
      throw new InputError(`invalid URL: ${errorMessage(err)}`);
    }
    requireAllowed(ctx, host);
  }

  const result = await probeWithFallback(raw, { ...ctx.config.http, signal: req.signal });
  ctx.stats.observeProbe(result.status !== '0' && result.error === '', result.probeTimeMs / 1000);
  return NextResponse.json(result);
};

/** POST /api/abort?target= */
export const abortHandler: ApiHandler = async (req, ctx) => {
  const target = targetParam(req);
  const cancelled = ctx.registry.abort(target);
  ctx.logger.info({ target, cancelled }, 'abort requested');
  return new Response(null, { status: 204 });
};

/** GET /api/status?target= */
export const statusHandler: ApiHandler = async (req, ctx) => {
  return NextResponse.json(ctx.registry.status(targetParam(req)));
};

/** GET /api/jobs */
export const jobsHandler: ApiHandler = async (_req, ctx) => {
  const jobs = ctx.registry.list();
  return NextResponse.json({ jobs, total: jobs.length });
};

/** GET /api/jobs/{id} */
export const jobDetailHandler: ApiHandler<{ id: string }> = async (_req, ctx, params) => {
  const job = typeof params.id === 'string' ? ctx.registry.get(params.id) : undefined;
  if (!job) throw new NotFoundError('job not found');
  return NextResponse.json(job.detail());
};

/** GET /api/stats */
export const statsHandler: ApiHandler = async (_req, ctx) => {
  const snapshot = await ctx.stats.snapshot();
  return NextResponse.json({
    ...snapshot,
    dnsServers: ctx.config.dns.servers,
    rateLimit: `${ctx.config.rateLimit.requestsPerSecond}/s`,
  });
};

/** GET /api/config */
export const configHandler: ApiHandler = async (_req, ctx) => {
  return NextResponse.json({ ...describeConfig(ctx.config), wordlistCategories: categorySizes() });
};

/** GET /api/version */
export const versionHandler: ApiHandler = async (_req, ctx) => {
  const { startTime, uptimeSeconds } = await ctx.stats.snapshot();
  return NextResponse.json({
    name: pkg.name,
    version: pkg.version,
    node: process.version,
    platform: `${process.platform}/${process.arch}`,
    startTime,
    uptimeSeconds,
  });
};
