import { z } from 'zod';

export const dashboardProfiles = ['hosted', 'local'] as const;
export type DashboardProfile = (typeof dashboardProfiles)[number];

export const HOSTED_DEFAULT_PORT = 10_000;
export const LOCAL_PORT = 8051;
export const BROWSER_OPEN_DELAY_MS = 1_500;
export const DEFAULT_DATA_FILE = 'data/disaster_map.json';

export type ServerConfig = {
  profile: DashboardProfile;
  host: string;
  port: number;
  /** Local profile runs the Next.js dev server with hot reload. */
  dev: boolean;
  openBrowser: boolean;
  dataFile: string;
  /** Directory a relative dataFile is resolved against. */
  dataAnchor: 'repo-root' | 'cwd';
};

const flagSchema = z.preprocess(
  (v) => (v === '' ? undefined : v),
  z
    .enum(['1', '0', 'true', 'false'])
    .transform((v) => v === '1' || v === 'true')
    .optional()
);

const envSchema = z.object({
  DASHBOARD_PROFILE: z.enum(dashboardProfiles).default('hosted'),
  PORT: z.preprocess(
    (v) => (v === undefined || v === '' ? undefined : Number(v)),
    z.number().int().min(1).max(65_535).optional()
  ),
  DISASTER_DATA_FILE: z.string().trim().min(1).default(DEFAULT_DATA_FILE),
  DASHBOARD_OPEN_BROWSER: flagSchema,
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function getServerConfig(env: Partial<NodeJS.ProcessEnv> = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid dashboard configuration (${details})`);
  }
  const { DASHBOARD_PROFILE: profile, PORT, DISASTER_DATA_FILE, DASHBOARD_OPEN_BROWSER } = parsed.data;

  if (profile === 'local') {
    return {
      profile,
      host: '127.0.0.1',
      port: LOCAL_PORT,
      dev: true,
      openBrowser: DASHBOARD_OPEN_BROWSER ?? true,
      dataFile: DISASTER_DATA_FILE,
      dataAnchor: 'cwd',
    };
  }

  return {
    profile,
    host: '0.0.0.0',
    port: PORT ?? HOSTED_DEFAULT_PORT,
    dev: false,
    openBrowser: DASHBOARD_OPEN_BROWSER ?? false,
    dataFile: DISASTER_DATA_FILE,
    dataAnchor: 'repo-root',
  };
}
