import type { NextApiRequest, NextApiResponse } from 'next';
import { getDashboardContext } from 'lib/server/dashboard';

export default function handler(req: NextApiRequest, res: NextApiResponse) {
  if (req.method !== 'GET') return res.status(405).json({ ok: false });
  const { table, dataset } = getDashboardContext();
  return res.status(200).json({
    ok: true,
    ts: new Date().toISOString(),
    env: process.env.NODE_ENV ?? 'unknown',
    dataset: {
      status: dataset.status,
      records: table.records.length,
      droppedRows: dataset.droppedRows,
      loadedAt: dataset.loadedAt,
      error: dataset.error?.message ?? null,
    },
  });
}
