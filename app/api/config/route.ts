import { preflight, withApi } from '../../../lib/api/middleware';
import { configHandler } from '../../../lib/api/handlers';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export const GET = withApi(configHandler);
export const OPTIONS = preflight();
