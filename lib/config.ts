// Centralized runtime configuration for timeouts, concurrency, rate limits and
// security toggles. Values are read from env once at start-up; tests build
// their own via `loadConfig`.

type Env = Record<string, string | undefined>;

export interface TimeoutConfig {
  wayback: number;
  crtsh: number;
  dns: number;
  search: number;
  permute: number;
  zone: number;
}

export interface DnsConfig {
  servers: string[];
  concurrency: number;
  timeoutMs: number;
  tries: number;
}

export interface HttpConfig {
  userAgent: string;
  maxRedirects: number;
  timeoutMs: number;
  maxBodySize: number;
  skipTlsVerify: boolean;
}

export interface RateLimitConfig {
  requestsPerSecond: number;
  burstSize: number;
  graceMs: number;
}

export interface SecurityConfig {
  allowedDomains: string[];
  blockedUserAgents: string[];
  maxConcurrentJobs: number;
  enableCors: boolean;
}

export interface AppConfig {
  logLevel: string;
  timeouts: TimeoutConfig;
  dns: DnsConfig;
  http: HttpConfig;
  rateLimit: RateLimitConfig;
  security: SecurityConfig;
  permuteConcurrency: number;
  streamQueueSize: number;
  zoneConnectTimeoutMs: number;
}

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/**
 * Parse `300000`, `250ms`, `30s`, `5m` or `1h` into milliseconds.
 * Returns null for anything else.
 */
export function parseDuration(value: string): number | null {
  const m = value.trim().match(/^(\d+(?:\.\d+)?)(ms|s|m|h)?$/);
  if (!m) return null;
  const n = Number(m[1]) * DURATION_UNITS[m[2] ?? 'ms'];
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : null;
}

function envInt(env: Env, name: string, fallback: number): number {
  const v = env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : fallback;
}

function envDuration(env: Env, name: string, fallback: number): number {
  const v = env[name];
  if (!v) return fallback;
  return parseDuration(v) ?? fallback;
}

function envBool(env: Env, name: string, fallback: boolean): boolean {
  const v = env[name]?.trim().toLowerCase();
  if (!v) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(v)) return true;
  if (['0', 'false', 'no', 'off'].includes(v)) return false;
  return fallback;
}

function envList(env: Env, name: string, fallback: string[]): string[] {
  const v = env[name];
  if (!v) return fallback;
  return v.split(',').map((s) => s.trim()).filter(Boolean);
}

export function loadConfig(env: Env = process.env): AppConfig {
  const dnsConcurrency = envInt(env, 'DNS_CONCURRENCY', 50);
  return {
    logLevel: (env.LOG_LEVEL || 'info').toLowerCase(),
    timeouts: {
      wayback: envDuration(env, 'TIMEOUT_WAYBACK', 5 * 60_000),
      crtsh: envDuration(env, 'TIMEOUT_CRTSH', 5 * 60_000),
      dns: envDuration(env, 'TIMEOUT_DNS', 10 * 60_000),
      search: envDuration(env, 'TIMEOUT_SEARCH', 5 * 60_000),
      permute: envDuration(env, 'TIMEOUT_PERMUTE', 10 * 60_000),
      zone: envDuration(env, 'TIMEOUT_ZONE', 2 * 60_000),
    },
    dns: {
      servers: envList(env, 'DNS_SERVERS', ['8.8.8.8:53', '1.1.1.1:53', '208.67.222.222:53']),
      concurrency: dnsConcurrency,
      timeoutMs: envDuration(env, 'DNS_TIMEOUT', 3000),
      tries: envInt(env, 'DNS_RETRIES', 2),
    },
    http: {
      userAgent: env.HTTP_USER_AGENT || 'Mozilla/5.0 (compatible; subdomain-scout/1.0)',
      maxRedirects: envInt(env, 'HTTP_MAX_REDIRECTS', 3),
      timeoutMs: envDuration(env, 'HTTP_TIMEOUT', 10_000),
      maxBodySize: envInt(env, 'HTTP_MAX_BODY_SIZE', 1024 * 1024), // 1 MiB
      skipTlsVerify: envBool(env, 'HTTP_SKIP_TLS_VERIFY', true),
    },
    rateLimit: {
      requestsPerSecond: envInt(env, 'RATE_LIMIT_RPS', 10),
      burstSize: envInt(env, 'RATE_LIMIT_BURST', 20),
      graceMs: envDuration(env, 'RATE_LIMIT_GRACE', 100),
    },
    security: {
      allowedDomains: envList(env, 'ALLOWED_DOMAINS', []).map((d) => d.toLowerCase()),
      blockedUserAgents: envList(env, 'BLOCKED_USER_AGENTS', ['bot', 'crawler', 'spider']),
      maxConcurrentJobs: envInt(env, 'MAX_CONCURRENT_JOBS', 10),
      enableCors: envBool(env, 'ENABLE_CORS', true),
    },
    permuteConcurrency: envInt(env, 'PERMUTE_CONCURRENCY', dnsConcurrency),
    streamQueueSize: envInt(env, 'STREAM_QUEUE_SIZE', 100),
    zoneConnectTimeoutMs: envDuration(env, 'ZONE_CONNECT_TIMEOUT', 5000),
  };
}

export const CONFIG: AppConfig = loadConfig();

export default CONFIG;
