import classNames from 'classnames';
import type { DashboardControls as Controls, DisasterType } from '@world-disasters/shared';

type Props = {
  controls: Controls;
  year: number;
  disasterType: string;
  onYearChange: (year: number) => void;
  onTypeChange: (type: DisasterType) => void;
};

export function DashboardControls({ controls, year, disasterType, onYearChange, onTypeChange }: Props) {
  const { years, types } = controls;

  return (
    <section className="space-y-5 rounded-2xl bg-white p-5 shadow">
      <div>
        <label htmlFor="year-slider" className="mb-2 block text-lg font-semibold">
          Select Year: <span className="text-blue-700">{years ? year : '—'}</span>
        </label>
        {years ? (
          <>
            <input
              id="year-slider"
              type="range"
              className="w-full accent-slate-700"
              min={years.min}
              max={years.max}
              step={years.step}
              value={year}
              onChange={(e) => onYearChange(Number(e.target.value))}
            />
            <div className="mt-1 flex justify-between text-[11px] text-gray-500">
              {years.marks.map((mark) => (
                <button
                  key={mark}
                  type="button"
                  className={classNames('rounded px-1 hover:text-gray-900', { 'font-bold text-gray-900': mark === year })}
                  onClick={() => onYearChange(mark)}
                >
                  {mark}
                </button>
              ))}
            </div>
          </>
        ) : (
          <div className="rounded-xl border bg-gray-50 px-3 py-2 text-sm text-gray-600">No disaster records are loaded.</div>
        )}
      </div>

      <div>
        <label htmlFor="disaster-dropdown" className="mb-2 block text-lg font-semibold">
          Select Disaster Type:
        </label>
        <select
          id="disaster-dropdown"
          className="w-full rounded-lg border border-gray-300 bg-white px-3 py-2"
          value={disasterType}
          disabled={types.options.length === 0}
          onChange={(e) => {
            const next = types.options.find((option) => option === e.target.value);
            if (next) onTypeChange(next);
          }}
        >
          {types.options.length === 0 && <option value={disasterType}>{disasterType}</option>}
          {types.options.map((option) => (
            <option key={option} value={option}>
              {option}
            </option>
          ))}
        </select>
      </div>
    </section>
  );
}
