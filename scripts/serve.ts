import 'dotenv/config';
import { spawn } from 'node:child_process';
import http from 'node:http';
import path from 'node:path';
import next from 'next';
import { BROWSER_OPEN_DELAY_MS, getServerConfig } from '../apps/web/lib/server/config';

const webDir = path.resolve(__dirname, '../apps/web');

function displayUrl(host: string, port: number): string {
  const shown = host === '0.0.0.0' ? 'localhost' : host;
  return `http://${shown}:${port}`;
}

function openBrowser(url: string) {
  const command = process.platform === 'darwin' ? 'open' : process.platform === 'win32' ? 'cmd' : 'xdg-open';
  const args = process.platform === 'win32' ? ['/c', 'start', '', url] : [url];
  const child = spawn(command, args, { stdio: 'ignore', detached: true });
  child.on('error', (err) => {
    console.warn(`[Serve] Could not open a browser: ${err.message}`);
  });
  child.unref();
}

async function main() {
  const config = getServerConfig();
  const app = next({ dev: config.dev, dir: webDir, hostname: config.host, port: config.port });
  const handle = app.getRequestHandler();
  await app.prepare();

  const server = http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      console.error('[Serve] Request failed:', err);
      if (!res.headersSent) res.statusCode = 500;
      res.end();
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, config.host, () => resolve());
  });

  const url = displayUrl(config.host, config.port);
  console.log(`[Serve] ${config.profile} dashboard listening on ${url}`);
  if (config.openBrowser) {
    setTimeout(() => openBrowser(url), BROWSER_OPEN_DELAY_MS);
  }
}

main().catch((err) => {
  console.error('[Serve] Failed to start:', err);
  process.exit(1);
});
