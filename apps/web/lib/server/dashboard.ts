import { loadDisasterDataset, type LoadedDataset } from '@world-disasters/loader';
import { buildDashboardControls, type DashboardControls, type DisasterTable } from '@world-disasters/shared';
import { getServerConfig } from './config';
import { resolveDatasetPath } from './paths';

export type DashboardContext = Readonly<{
  table: DisasterTable;
  controls: DashboardControls;
  dataset: Omit<LoadedDataset, 'table'>;
}>;

declare global {
  // eslint-disable-next-line no-var
  var disasterDashboard: DashboardContext | undefined;
}

export function createDashboardContext(dataset: LoadedDataset): DashboardContext {
  const { table, ...meta } = dataset;
  return Object.freeze({
    table,
    controls: buildDashboardControls(table),
    dataset: Object.freeze(meta),
  });
}

/**
 * The process-wide dashboard context. Instrumentation and every API route bundle
 * share it through globalThis, so the dataset is read once per server process.
 */
export function getDashboardContext(): DashboardContext {
  if (global.disasterDashboard) return global.disasterDashboard;
  const config = getServerConfig();
  const context = createDashboardContext(loadDisasterDataset(resolveDatasetPath(config)));
  global.disasterDashboard = context;
  return context;
}
