import { describe, expect, it } from 'vitest';
import { createDisasterTable, updateView, type DisasterRecord } from '@world-disasters/shared';
import { ViewSession, type PendingView } from 'lib/client/viewSession';

const quake: DisasterRecord = {
  latitude: 35.0,
  longitude: 139.0,
  totalDeaths: 1000,
  totalDamage: 500000,
  startYear: 2011,
  disasterType: 'Earthquake',
  location: 'Japan',
};

const table = createDisasterTable([quake, { ...quake, startYear: 2010, location: 'Coast' }]);

function respond({ body }: PendingView) {
  return updateView(table, { year: body.year, disasterType: body.disasterType }, body.viewport, body.viewState);
}

describe('ViewSession', () => {
  it('starts from the default view state', () => {
    expect(new ViewSession().current).toEqual({ zoom: 2, center: { lat: 20, lon: 0 } });
  });

  it('sends the viewport merged into the session state', () => {
    const session = new ViewSession();
    const pending = session.prepare({ year: 2011, disasterType: 'Earthquake' }, { zoom: 7 });

    expect(pending.body).toEqual({
      year: 2011,
      disasterType: 'Earthquake',
      viewport: { zoom: 7 },
      viewState: { zoom: 7, center: { lat: 20, lon: 0 } },
    });
  });

  it('keeps a zoom whose response was superseded by a filter change', () => {
    const session = new ViewSession();
    const zoomed = session.prepare({ year: 2011, disasterType: 'Earthquake' }, { zoom: 7, center: { lat: 35, lon: 139 } });
    const filtered = session.prepare({ year: 2010, disasterType: 'Earthquake' });

    expect(filtered.body.viewState).toEqual({ zoom: 7, center: { lat: 35, lon: 139 } });

    const latest = session.accept(filtered.requestId, respond(filtered));
    expect(session.accept(zoomed.requestId, respond(zoomed))).toBeNull();

    expect(latest?.map.layer.kind).toBe('points');
    expect(latest?.stats.year).toBe(2010);
    expect(session.current).toEqual({ zoom: 7, center: { lat: 35, lon: 139 } });
  });

  it('ignores a failed request', () => {
    const session = new ViewSession();
    const pending = session.prepare({ year: 2011, disasterType: 'Earthquake' }, { zoom: 4 });

    expect(session.accept(pending.requestId, undefined)).toBeNull();
    expect(session.current.zoom).toBe(4);
  });
});
