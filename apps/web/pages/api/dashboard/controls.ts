import type { NextApiRequest, NextApiResponse } from 'next';
import { getDashboardContext } from 'lib/server/dashboard';

export default function handler(req: NextApiRequest, res: NextApiResponse) {
  if (req.method !== 'GET') {
    return res.status(405).json({ error: 'Method not allowed' });
  }
  const { controls } = getDashboardContext();
  return res.status(200).json(controls);
}
