import { preflight, withApi } from '../../../lib/api/middleware';
import { probeHandler } from '../../../lib/api/handlers';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export const GET = withApi(probeHandler);
export const OPTIONS = preflight();
