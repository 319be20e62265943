import useSWR from 'swr';
import { useCallback, useEffect, useState } from 'react';
import type { DashboardControls as Controls, ViewSelection, ViewportChange } from '@world-disasters/shared';
import { Seo } from '../components/Seo';
import DisasterMap from '../components/DisasterMap';
import { DashboardControls } from '../components/DashboardControls';
import { StatsPanel } from '../components/StatsPanel';
import { useDashboardView } from '../lib/client/dashboardView';

const fetcher = (url: string) =>
  fetch(url).then((r) => {
    if (!r.ok) throw new Error(`HTTP ${r.status}`);
    return r.json();
  });

function Notice({ children }: { children: string }) {
  return (
    <div className="rounded-xl bg-amber-50 px-4 py-3 text-sm font-semibold text-amber-900 ring-1 ring-amber-200">{children}</div>
  );
}

export default function DashboardPage() {
  const { data: controls, error: controlsError } = useSWR<Controls>('/api/dashboard/controls', fetcher);
  const { view, requestView, initialViewState, error, loading } = useDashboardView();
  const [selection, setSelection] = useState<ViewSelection | null>(null);

  useEffect(() => {
    if (!controls || selection) return;
    setSelection({ year: controls.years?.value ?? 0, disasterType: controls.types.value });
  }, [controls, selection]);

  useEffect(() => {
    if (!selection) return;
    void requestView(selection);
  }, [selection, requestView]);

  const handleViewportChange = useCallback(
    (change: ViewportChange) => {
      if (!selection) return;
      void requestView(selection, change);
    },
    [selection, requestView]
  );

  const title = controls?.title ?? 'Natural Disaster Visualization';

  return (
    <div className="space-y-6">
      <Seo title={title} />
      <h1 className="text-center text-3xl font-bold text-slate-700 md:text-4xl">{title}</h1>

      {controlsError && <Notice>Could not load the dashboard controls. Reload the page to try again.</Notice>}
      {error && <Notice>The map could not be updated. The last result is still shown.</Notice>}

      {controls && selection && (
        <DashboardControls
          controls={controls}
          year={selection.year}
          disasterType={selection.disasterType}
          onYearChange={(year) => setSelection((prev) => (prev ? { ...prev, year } : prev))}
          onTypeChange={(disasterType) => setSelection((prev) => (prev ? { ...prev, disasterType } : prev))}
        />
      )}

      <StatsPanel stats={view?.stats ?? null} />

      <section className="relative rounded-2xl bg-white p-4 shadow">
        {loading && (
          <div className="absolute right-6 top-6 z-[1000] rounded-full bg-white/90 px-3 py-1 text-xs text-gray-600 ring-1 ring-gray-200">
            Updating…
          </div>
        )}
        <DisasterMap initialViewState={initialViewState} map={view?.map ?? null} onViewportChange={handleViewportChange} />
      </section>
    </div>
  );
}
