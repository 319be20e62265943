import type { DisasterStats } from '@world-disasters/shared';
import { formatCount, formatDamage } from 'lib/ui/format';

export function StatsPanel({ stats }: { stats: DisasterStats | null }) {
  if (!stats) {
    return <div className="rounded-2xl bg-white p-5 text-center text-sm text-gray-500 shadow">Loading statistics…</div>;
  }

  return (
    <section className="rounded-2xl bg-white p-5 text-center shadow" aria-label="Statistics">
      <h3 className="text-xl font-semibold text-slate-700">Year: {stats.year}</h3>
      <h4 className="mt-1 text-lg font-semibold text-slate-700">Disaster Type: {stats.disasterType}</h4>
      <dl className="mt-3 grid gap-2 text-base md:grid-cols-3">
        <div className="rounded-xl border bg-gray-50 p-3">
          <dt className="text-xs text-gray-600">Total Events</dt>
          <dd className="mt-1 font-semibold">{formatCount(stats.totalEvents)}</dd>
        </div>
        <div className="rounded-xl border bg-gray-50 p-3">
          <dt className="text-xs text-gray-600">Total Deaths</dt>
          <dd className="mt-1 font-semibold">{formatCount(stats.totalDeaths)}</dd>
        </div>
        <div className="rounded-xl border bg-gray-50 p-3">
          <dt className="text-xs text-gray-600">Total Damage (&apos;000 US$)</dt>
          <dd className="mt-1 font-semibold">{formatDamage(stats.totalDamage)}</dd>
        </div>
      </dl>
    </section>
  );
}
