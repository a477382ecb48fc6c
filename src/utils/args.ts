export interface CLIOptions {
  queries: string[];
  queriesFile?: string;
  sites?: number;
  timeoutSeconds?: number;
  maxResults?: number;
  workers?: number;
  noRender?: boolean;
  outputDir?: string;
  dryRun?: boolean;
  delaySeconds?: number;
  start?: number;
  end?: number;
}

function readNumber(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Missing or invalid value for ${flag}`);
  }
  return parsed;
}

/** For counts and indexes. */
function readInteger(flag: string, value: string | undefined): number {
  const parsed = readNumber(flag, value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${flag} takes a whole number (got ${value})`);
  }
  return parsed;
}

function readString(flag: string, value: string | undefined): string {
  if (!value) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

export function parseArgs(argv: string[]): CLIOptions {
  const options: CLIOptions = { queries: [] };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--query' || arg === '-q') {
      options.queries.push(readString(arg, argv[++i]));
    } else if (arg === '--queries-file' || arg === '-f') {
      options.queriesFile = readString(arg, argv[++i]);
    } else if (arg === '--sites' || arg === '-n') {
      options.sites = readInteger(arg, argv[++i]);
    } else if (arg === '--timeout' || arg === '-t') {
      options.timeoutSeconds = readNumber(arg, argv[++i]);
    } else if (arg === '--max-results') {
      options.maxResults = readInteger(arg, argv[++i]);
    } else if (arg === '--workers') {
      options.workers = readInteger(arg, argv[++i]);
    } else if (arg === '--no-render') {
      options.noRender = true;
    } else if (arg === '--output' || arg === '-o') {
      options.outputDir = readString(arg, argv[++i]);
    } else if (arg === '--dry-run') {
      options.dryRun = true;
    } else if (arg === '--delay') {
      options.delaySeconds = readNumber(arg, argv[++i]);
    } else if (arg === '--start') {
      options.start = readInteger(arg, argv[++i]);
    } else if (arg === '--end') {
      options.end = readInteger(arg, argv[++i]);
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown flag: ${arg}`);
    } else {
      options.queries.push(arg);
    }
  }

  return options;
}
