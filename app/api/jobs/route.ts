import { preflight, withApi } from '../../../lib/api/middleware';
import { jobsHandler } from '../../../lib/api/handlers';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export const GET = withApi(jobsHandler);
export const OPTIONS = preflight();
