import { preflight, withApi } from '../../../lib/api/middleware';
import { statusHandler } from '../../../lib/api/handlers';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export const GET = withApi(statusHandler);
export const OPTIONS = preflight();
