import { z } from 'zod';

/**
 * Bridge configuration, read from the environment once at startup.
 */
export interface BridgeConfig {
  readonly workspaceName: string;
  /** Empty disables signature verification. */
  readonly webhookSecret: string;
  readonly appUrl: string;
  readonly server: { readonly host: string; readonly port: number };
  readonly logLevel: string;
  readonly discord: DiscordConfig;
}

export interface DiscordConfig {
  /** Empty disables delivery. */
  readonly webhookUrl: string;
  readonly username: string;
  readonly avatarUrl: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: readonly z.ZodIssue[]) {
    super(
      `Invalid configuration: ${issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
    );
    this.name = 'ConfigError';
  }
}

const envSchema = z.object({
  WORKSPACE_NAME: z.string().default('Workspace'),
  WEBHOOK_SECRET: z.string().default(''),
  DISCORD_WEBHOOK_URL: z.union([z.literal(''), z.string().url()]).default(''),
  APP_URL: z.string().url().default('https://plane.so'),
  WEB_PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  SENDER_NAME: z.string().min(1).default('Plane'),
});

/**
 * Validates the environment and derives the bridge configuration.
 *
 * Unset variables take their defaults; invalid ones throw ConfigError.
 */
export function loadBridgeConfig(
  env: Record<string, string | undefined> = process.env,
): BridgeConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }

  const vars = parsed.data;
  const appUrl = vars.APP_URL.replace(/\/+$/, '');

  return {
    workspaceName: vars.WORKSPACE_NAME,
    webhookSecret: vars.WEBHOOK_SECRET,
    appUrl,
    server: { host: vars.HOST, port: vars.WEB_PORT },
    logLevel: vars.LOG_LEVEL,
    discord: {
      webhookUrl: vars.DISCORD_WEBHOOK_URL,
      username: vars.SENDER_NAME,
      avatarUrl: `${appUrl}/plane-icon.png`,
    },
  };
}
