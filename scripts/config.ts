import { z } from 'zod';
import { ConfigError } from './errors';
import type { EmailCredential, ReportKind } from './types';

export const ReportConfigSchema = z
  .object({
    kind: z.enum(['commits', 'server', 'daily']),
    reposDir: z.string().min(1).optional(),
    gmailUsername: z.string().min(1).optional(),
    appPassword: z.string().min(1).optional(),
    recipients: z.array(z.string().email()).default([]),
    debug: z.boolean().default(false),
    html: z.boolean().default(false),
    prettyLogs: z.boolean().default(false),
    mounts: z.array(z.string().min(1)).min(1).default(['/']),
    windowHours: z.coerce.number().int().positive().default(24),
    countLines: z.boolean().default(true),
  })
  .superRefine((config, ctx) => {
    if (config.kind !== 'server' && !config.reposDir) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['reposDir'], message: `Required for the ${config.kind} report` });
    }
    // A dry run prints the report, so it can go without credentials.
    if (!config.debug) {
      if (!config.gmailUsername) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['gmailUsername'], message: 'Required to send the report' });
      }
      if (!config.appPassword) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['appPassword'], message: 'Required to send the report' });
      }
    }
  });

export type ReportConfig = z.infer<typeof ReportConfigSchema>;

/** Options as commander hands them over. */
export interface CliOptions {
  repos_dir?: string;
  gmail_username?: string;
  app_password?: string;
  to?: string[];
  debug?: boolean;
  html?: boolean;
  mount?: string[];
  window_hours?: string;
  skip_line_counts?: boolean;
}

function splitList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value.split(',').map(item => item.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}

/**
 * Merges command-line options over the environment and validates the result.
 */
export function loadConfig(kind: ReportKind, cli: CliOptions, env: NodeJS.ProcessEnv = process.env): ReportConfig {
  const raw = {
    kind,
    reposDir: cli.repos_dir ?? env.REPOS_DIR,
    gmailUsername: cli.gmail_username ?? env.GMAIL_USERNAME,
    appPassword: cli.app_password ?? env.GMAIL_APP_PASSWORD,
    recipients: cli.to ?? splitList(env.REPORT_RECIPIENTS),
    debug: cli.debug,
    html: cli.html,
    prettyLogs: env.LOG_PRETTY === '1' || env.LOG_PRETTY === 'true',
    mounts: cli.mount,
    windowHours: cli.window_hours,
    countLines: cli.skip_line_counts ? false : undefined,
  };

  const result = ReportConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(result.error.errors.map(e => ({ path: e.path.join('.'), message: e.message })));
  }
  return result.data;
}

export function credentialFrom(config: ReportConfig): EmailCredential {
  return {
    username: config.gmailUsername ?? '',
    appPassword: config.appPassword ?? '',
  };
}
