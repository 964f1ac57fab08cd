import { Command, InvalidArgumentError } from 'commander';
import { CliOptions } from './types/config';
import { LOG_LEVELS, LogLevel, isLogLevel } from './utils/logger';
import { VERSION } from './version';

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError(`Allowed levels: ${LOG_LEVELS.join(', ')}`);
  }
  return value;
}

export function parseCliArguments(argv: string[] = process.argv): CliOptions {
  const program = new Command();

  program
    .name('vault-lease-loader')
    .description('Loads secrets from Vault and refreshes them before their leases expire')
    .version(VERSION.toString())
    .option('-c, --config <path>', 'path to configuration file')
    .option('--once', 'load the secrets once and exit instead of renewing them')
    .option('--print-keys', 'log the names of the loaded keys (never their values)')
    .option('--log-level <level>', 'override the configured log level', parseLogLevel)
    .parse(argv);

  const options = program.opts<{ config?: string; once?: boolean; printKeys?: boolean; logLevel?: LogLevel }>();

  return {
    config: options.config,
    once: options.once,
    printKeys: options.printKeys,
    logLevel: options.logLevel,
  };
}
