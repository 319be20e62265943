import { useCallback, useState } from 'react';
import useSWRMutation from 'swr/mutation';
import type { ViewResult, ViewSelection, ViewportChange } from '@world-disasters/shared';
import { ViewSession, type ViewRequestBody } from './viewSession';

export const VIEW_ENDPOINT = '/api/dashboard/view';

export async function postView(url: string, { arg }: { arg: ViewRequestBody }): Promise<ViewResult> {
  const res = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(arg),
  });
  if (!res.ok) throw new Error(`HTTP ${res.status}`);
  const result: ViewResult = await res.json();
  return result;
}

/** Threads the session's view state through every view request. */
export function useDashboardView() {
  const [session] = useState(() => new ViewSession());
  const [initialViewState] = useState(() => session.current);
  const [view, setView] = useState<ViewResult | null>(null);
  const { trigger, error, isMutating } = useSWRMutation(VIEW_ENDPOINT, postView, { throwOnError: false });

  const requestView = useCallback(
    async (selection: ViewSelection, viewport: ViewportChange | null = null) => {
      const { requestId, body } = session.prepare(selection, viewport);
      const accepted = session.accept(requestId, await trigger(body));
      if (accepted) setView(accepted);
    },
    [session, trigger]
  );

  return {
    view,
    requestView,
    initialViewState,
    error: error instanceof Error ? error.message : null,
    loading: isMutating,
  };
}
