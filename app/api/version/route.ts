import { preflight, withApi } from '../../../lib/api/middleware';
import { versionHandler } from '../../../lib/api/handlers';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export const GET = withApi(versionHandler);
export const OPTIONS = preflight();
