/**
 * Command line argument parsing
 */

export type Command = 'solve' | 'analyze' | 'help';
export type AlgorithmChoice = 'dfs' | 'astar' | 'both';
export type OutputFormat = 'text' | 'json';

export interface CLIOptions {
  command: Command;
  inputFile?: string;
  algorithm: AlgorithmChoice;
  dfsOut?: string;
  astarOut?: string;
  outputFormat: OutputFormat;
  maxExpansions?: number;
  maxTime?: number; // ms
  pruneSymmetric: boolean;
  optimalDfs: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function isCommand(value: string): value is Command {
  return value === 'solve' || value === 'analyze' || value === 'help';
}

function isAlgorithm(value: string): value is AlgorithmChoice {
  return value === 'dfs' || value === 'astar' || value === 'both';
}

function isFormat(value: string): value is OutputFormat {
  return value === 'text' || value === 'json';
}

function positiveInt(flag: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new UsageError(`${flag} expects a positive integer, got '${value}'`);
  }
  return n;
}

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    command: 'help',
    algorithm: 'astar',
    outputFormat: 'text',
    pruneSymmetric: false,
    optimalDfs: false,
  };

  const next = (flag: string, i: number): string => {
    const value = args[i];
    if (value === undefined) {
      throw new UsageError(`${flag} expects a value`);
    }
    return value;
  };

  let commandSeen = false;
  let algorithmSeen = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-i':
      case '--input':
        options.inputFile = next(arg, ++i);
        break;

      case '-a':
      case '--algorithm': {
        const value = next(arg, ++i).toLowerCase();
        if (!isAlgorithm(value)) {
          throw new UsageError(`unknown algorithm '${value}' (expected dfs, astar or both)`);
        }
        options.algorithm = value;
        algorithmSeen = true;
        break;
      }

      case '--dfs-out':
        options.dfsOut = next(arg, ++i);
        break;

      case '--astar-out':
        options.astarOut = next(arg, ++i);
        break;

      case '-f':
      case '--format': {
        const value = next(arg, ++i).toLowerCase();
        if (!isFormat(value)) {
          throw new UsageError(`unknown format '${value}' (expected text or json)`);
        }
        options.outputFormat = value;
        break;
      }

      case '-m':
      case '--max-expansions':
        options.maxExpansions = positiveInt(arg, next(arg, ++i));
        break;

      case '-t':
      case '--time':
        options.maxTime = positiveInt(arg, next(arg, ++i)) * 1000;
        break;

      case '-s':
      case '--symmetry':
        options.pruneSymmetric = true;
        break;

      case '-o':
      case '--optimal-dfs':
        options.optimalDfs = true;
        break;

      case '-h':
      case '--help':
        options.command = 'help';
        commandSeen = true;
        break;

      default:
        if (arg.startsWith('-')) {
          throw new UsageError(`unknown option '${arg}'`);
        }
        if (!commandSeen && isCommand(arg)) {
          options.command = arg;
          commandSeen = true;
        } else if (options.inputFile === undefined) {
          options.inputFile = arg;
        } else {
          throw new UsageError(`unexpected argument '${arg}'`);
        }
    }
  }

  // Out files pick their algorithm unless -a is given
  if (!algorithmSeen && options.dfsOut !== undefined) {
    options.algorithm = options.astarOut !== undefined ? 'both' : 'dfs';
  }
  if (options.dfsOut !== undefined && options.algorithm === 'astar') {
    throw new UsageError('--dfs-out needs the dfs algorithm (-a dfs or -a both)');
  }
  if (options.astarOut !== undefined && options.algorithm === 'dfs') {
    throw new UsageError('--astar-out needs the astar algorithm (-a astar or -a both)');
  }

  return options;
}
