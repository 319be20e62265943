export async function register() {
  if (process.env.NEXT_RUNTIME !== 'nodejs') return;
  const { getDashboardContext } = await import('./lib/server/dashboard');
  const { table, dataset } = getDashboardContext();
  console.log(`[Dashboard] Ready with ${table.records.length} records (${dataset.status})`);
}
