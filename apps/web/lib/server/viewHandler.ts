import type { NextApiRequest } from 'next';
import { defaultViewState, updateView } from '@world-disasters/shared';
import { ViewRequestSchema } from 'lib/validators';
import type { DashboardContext } from './dashboard';

export type ApiRequest = Pick<NextApiRequest, 'method' | 'body'>;

export type ApiResponse = {
  status(statusCode: number): ApiResponse;
  json(body: unknown): void;
  setHeader(name: string, value: string): void;
};

/**
 * POST /api/dashboard/view
 * Applies the viewport event to the caller's view state and recomputes map and stats.
 */
export function createViewHandler(getContext: () => DashboardContext) {
  return function handleView(req: ApiRequest, res: ApiResponse) {
    if (req.method !== 'POST') {
      res.setHeader('Allow', 'POST');
      return res.status(405).json({ error: 'Method not allowed' });
    }

    const parsed = ViewRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid view request', issues: parsed.error.issues });
    }

    try {
      const { table } = getContext();
      const { year, disasterType, viewport, viewState } = parsed.data;
      const result = updateView(table, { year, disasterType }, viewport, viewState ?? defaultViewState());
      return res.status(200).json(result);
    } catch (error) {
      console.error('[DashboardView] Failed to update view:', error);
      return res.status(500).json({ error: 'Failed to update view' });
    }
  };
}
