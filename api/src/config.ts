import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  RANKING_FILE: z.string().min(1).default('ranking.json'),
  LINTER_BIN: z.string().min(1).default('pylint'),
  LINTER_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  NODE_ENV: z.string().optional(),
});

export interface AppConfig {
  port: number;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  corsOrigin: string;
  rankingFile: string;
  linterBin: string;
  linterTimeoutMs: number;
  exposeStack: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${details.join('; ')}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    corsOrigin: e.CORS_ORIGIN,
    rankingFile: e.RANKING_FILE,
    linterBin: e.LINTER_BIN,
    linterTimeoutMs: e.LINTER_TIMEOUT_MS,
    exposeStack: e.NODE_ENV !== 'production',
  };
}

export const config = loadConfig();
