import { Command } from 'commander';
import type { Logger } from 'pino';
import type { GitReaderFactory } from './collect-repos';
import type { TelemetrySource } from './collect-telemetry';
import { credentialFrom, loadConfig, type CliOptions, type ReportConfig } from './config';
import { ReportError } from './errors';
import { createLogger } from './logger';
import { EmailNotifier, type Notifier } from './notify';
import { runReport } from './pipeline';
import type { ReportKind } from './types';

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  now?: () => Date;
  git?: GitReaderFactory;
  telemetry?: TelemetrySource;
  write?: (text: string) => void;
  notifier?: (config: ReportConfig, logger: Logger) => Notifier;
}

const defaultNotifier = (config: ReportConfig, logger: Logger): Notifier =>
  new EmailNotifier({
    credential: credentialFrom(config),
    recipients: config.recipients,
    logger,
  });

/** Runs one report and returns the process exit code. */
export async function runCommand(kind: ReportKind, cli: CliOptions, deps: CliDeps = {}): Promise<number> {
  let logger = deps.logger ?? createLogger({ level: cli.debug ? 'debug' : 'info' });

  try {
    const config = loadConfig(kind, cli, deps.env);
    if (!deps.logger && config.prettyLogs) {
      logger = createLogger({ level: config.debug ? 'debug' : 'info', prettyPrint: true });
    }

    const result = await runReport(
      {
        kind,
        reposDir: config.reposDir,
        windowHours: config.windowHours,
        countLines: config.countLines,
        mounts: config.mounts,
        html: config.html,
        dryRun: config.debug,
      },
      {
        notifier: config.debug ? undefined : (deps.notifier ?? defaultNotifier)(config, logger),
        now: deps.now,
        git: deps.git,
        telemetry: deps.telemetry,
        write: deps.write,
        logger,
      },
    );

    if (result.warnings.length > 0) {
      logger.info({ skipped: result.warnings.map(w => w.source) }, `${result.warnings.length} source(s) skipped`);
    }
    return 0;
  } catch (error) {
    const code = error instanceof ReportError ? error.code : 'UNEXPECTED';
    logger.error({ err: error, code }, `${kind} report failed`);
    return 1;
  }
}

function withMailOptions(command: Command): Command {
  return command
    .option('--gmail_username <name>', 'Gmail account to send from (env GMAIL_USERNAME)')
    .option('--app_password <secret>', 'app password for the account (env GMAIL_APP_PASSWORD)')
    .option('--to <address...>', 'recipients, defaults to the sender (env REPORT_RECIPIENTS)')
    .option('--html', 'add an HTML alternative to the message')
    .option('--debug', 'log debugging info and print the report instead of mailing it');
}

function withRepoOptions(command: Command): Command {
  return command
    .option('--repos_dir <path>', 'directory that contains the repositories to report on (env REPOS_DIR)')
    .option('--window_hours <hours>', 'commits newer than this count as new', '24')
    .option('--skip_line_counts', 'do not count lines of tracked source');
}

function withTelemetryOptions(command: Command): Command {
  return command.option('--mount <path...>', 'mount points to report disk usage for', ['/']);
}

export function buildProgram(deps: CliDeps = {}): Command {
  const program = new Command()
    .name('home-report')
    .description('Home-server maintenance reports, mailed through Gmail');

  const action = (kind: ReportKind) => async (options: CliOptions) => {
    process.exitCode = await runCommand(kind, options, deps);
  };

  withMailOptions(withRepoOptions(program.command('commits').description('recent activity across a directory of repositories')))
    .action(action('commits'));

  withMailOptions(withTelemetryOptions(program.command('server').description('disk, memory, uptime and load of this host')))
    .action(action('server'));

  withMailOptions(withTelemetryOptions(withRepoOptions(program.command('daily').description('commit and server reports in one message'))))
    .action(action('daily'));

  return program;
}
