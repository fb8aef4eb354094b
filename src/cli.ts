/**
 * Command-line surface: one invocation == one alert run. Scheduling is left
 * to cron or a systemd timer.
 */

import { Command } from 'commander';
import { config } from './config.js';
import { createLogger, errorMessage, setDebugLogging } from './logger.js';
import { runAlerts } from './monitor/run.js';

const VERSION = '1.0.0';

const log = createLogger('Alerts');

interface CliOptions {
  config: string;
  history: string;
  emails: boolean;
  debug: boolean;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('cluster-alerts')
    .description(
      'Email operators when cluster capacity, directory quotas or replication relationships ' +
        'cross the thresholds in the rule document. Each condition alerts once per threshold.',
    )
    .version(VERSION, '-v, --version', 'Show version number')
    .requiredOption('-c, --config <path>', 'Rule document (JSON) to evaluate')
    .option('-H, --history <path>', 'File used to store the alert history', config.historyFile)
    .option('--no-emails', 'Do not send emails; log them instead')
    .option('--debug', 'Enable debug logging', config.debug)
    .action(async (options: CliOptions) => {
      setDebugLogging(options.debug);
      try {
        await runAlerts({
          configFile: options.config,
          historyFile: options.history,
          sendEmails: options.emails,
        });
        process.exitCode = 0;
      } catch (err) {
        log.error(errorMessage(err));
        process.exitCode = 1;
      }
    });

  return program;
}
