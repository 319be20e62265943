import type { NextApiRequest, NextApiResponse } from 'next';
import { getDashboardContext } from 'lib/server/dashboard';
import { createViewHandler } from 'lib/server/viewHandler';

const handleView = createViewHandler(getDashboardContext);

export default function handler(req: NextApiRequest, res: NextApiResponse) {
  return handleView(req, res);
}
