import { Argument, Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import moment from 'moment';
import { ConfigurationError } from './errors';
import { LogsCommandOptions, runLogsCommand } from './logs-command';
import { parseTimestamp } from './time-range';
import { LogResponse, LogsCommand } from './types';

export type LogsRunner = (command: LogsCommand, options: LogsCommandOptions) => Promise<LogResponse>;

interface GlobalOptions {
  verbose?: boolean;
  pretty?: boolean;
}

export interface ProgramOptions {
  run?: LogsRunner;
}

const LOGS_COMMANDS: readonly LogsCommand[] = ['retrieve', 'list'];

const START_TIME_HELP = 'RFC3339 datetime (UTC), e.g. 2024-01-11T15:00:00Z (default: 5 minutes ago)';
const END_TIME_HELP = 'RFC3339 datetime (UTC), e.g. 2024-01-11T15:05:00Z (default: now)';

function isLogsCommand(value: string): value is LogsCommand {
  return LOGS_COMMANDS.some(command => command === value);
}

function parseTimestampArgument(value: string): moment.Moment {
  try {
    return parseTimestamp(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Same message and code commander uses when an argParser rejects a value
 */
function parseTimestampOperand(command: Command, value: string | undefined, name: string): moment.Moment | undefined {
  if (value === undefined) {
    return undefined;
  }
  try {
    return parseTimestamp(value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    command.error(`error: command-argument value '${value}' is invalid for argument '${name}'. ${reason}`, {
      code: 'commander.invalidArgument',
      exitCode: 1
    });
  }
}

function handleCommandError(error: unknown): never {
  if (error instanceof ConfigurationError) {
    console.error(chalk.red(error.message));
    console.error('');
    console.error(chalk.yellow('Please set environment variables'));
  } else {
    console.error(chalk.red(`❌ Error: ${error instanceof Error ? error.message : String(error)}`));
  }
  process.exit(1);
}

export function createProgram(options: ProgramOptions = {}): Command {
  const run = options.run ?? runLogsCommand;
  const program = new Command();

  program
    .name('r2logs')
    .description('Retrieve logs stored in R2 by Cloudflare Logpush')
    .version('1.0.0');

  // Global options
  program
    .option('-v, --verbose', 'Verbose output, print time range and endpoint', false)
    .option('-p, --pretty', 'Pretty-print each JSON record', false);

  const runCommand = async (
    name: LogsCommand,
    startTime: moment.Moment | undefined,
    endTime: moment.Moment | undefined
  ): Promise<void> => {
    const globals = program.opts<GlobalOptions>();
    try {
      await run(name, {
        startTime,
        endTime,
        verbose: globals.verbose,
        pretty: globals.pretty
      });
    } catch (error) {
      handleCommandError(error);
    }
  };

  // Default command. Also accepts the subcommand after the time range: r2logs T1 T2 list
  program
    .command('retrieve', { isDefault: true })
    .description('(default) Stream logs stored in R2 that match the time range')
    .argument('[start_time]', START_TIME_HELP)
    .argument('[end_time]', END_TIME_HELP)
    .argument('[command]', 'retrieve or list, when given after the time range')
    .allowExcessArguments(false)
    .action(async (
      first: string | undefined,
      second: string | undefined,
      third: string | undefined,
      _options: unknown,
      command: Command
    ) => {
      const operands = [first, second, third].filter((value): value is string => value !== undefined);
      const last = operands[operands.length - 1];
      const trailing = last !== undefined && isLogsCommand(last) ? last : undefined;
      const times = trailing ? operands.slice(0, -1) : operands;

      if (times.length > 2) {
        command.error(`error: '${times[2]}' is not a command, expected one of: ${LOGS_COMMANDS.join(', ')}`, {
          code: 'commander.invalidArgument',
          exitCode: 1
        });
      }
      if (trailing && trailing !== 'retrieve' && program.args[0] === 'retrieve') {
        command.error(`error: 'retrieve' cannot be combined with a trailing '${trailing}'`, {
          code: 'commander.conflictingCommand',
          exitCode: 1
        });
      }

      await runCommand(
        trailing ?? 'retrieve',
        parseTimestampOperand(command, times[0], 'start_time'),
        parseTimestampOperand(command, times[1], 'end_time')
      );
    });

  program
    .command('list')
    .description('List R2 objects containing logs that match the time range')
    .addArgument(new Argument('[start_time]', START_TIME_HELP).argParser(parseTimestampArgument))
    .addArgument(new Argument('[end_time]', END_TIME_HELP).argParser(parseTimestampArgument))
    .allowExcessArguments(false)
    .action(async (startTime: moment.Moment | undefined, endTime: moment.Moment | undefined) => {
      await runCommand('list', startTime, endTime);
    });

  return program;
}
