import { preflight, withApi } from '../../../lib/api/middleware';
import { statsHandler } from '../../../lib/api/handlers';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export const GET = withApi(statsHandler);
export const OPTIONS = preflight();
