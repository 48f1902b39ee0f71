import os from 'os';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const configSchema = z.object({
  runner: z.object({
    // Empty PINENTRY_USER_DATA means "no preference"
    requested: z.string().optional().transform((value) => value || undefined),
  }),

  display: z.object({
    x11: z.string().optional(),
    wayland: z.string().optional(),
  }),

  debug: z.object({
    enabled: z.boolean().default(false),
    file: z.string().default(path.join(os.tmpdir(), 'pinentry-menu.log')),
  }),

  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('warn'),
    pretty: z.boolean().default(false),
  }),
});

export type Config = z.infer<typeof configSchema>;

export function parseConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    runner: {
      requested: env.PINENTRY_USER_DATA,
    },
    display: {
      x11: env.DISPLAY,
      wayland: env.WAYLAND_DISPLAY,
    },
    debug: {
      enabled: Boolean(env.PINENTRY_DEBUG),
      file: env.PINENTRY_DEBUG_FILE || undefined,
    },
    logging: {
      level: env.LOG_LEVEL || undefined,
      pretty: env.LOG_PRETTY === 'true',
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return result.data;
}

function loadConfig(): Config {
  try {
    return parseConfig();
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;

    console.error('Configuration validation failed:');
    for (const issue of err.issues) {
      console.error(`  - ${issue}`);
    }
    process.exit(1);
  }
}

export const config = loadConfig();
