import { preflight, withApi } from '../../../lib/api/middleware';
import { abortHandler } from '../../../lib/api/handlers';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export const POST = withApi(abortHandler);
export const OPTIONS = preflight();
