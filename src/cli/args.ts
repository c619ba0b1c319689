import { ConfigurationError } from '../errors';
import { TraversalStrategy } from '../types';

export const USAGE = `Usage: squadtrace [options]

Reads the player list of a BattleMetrics server, then walks the Steam friends
lists (and optionally profile comments) of the given profiles to find which
of their friends are on the server, recursively. Prints the players found and
writes an HTML graph of who is connected to whom.

Options:
  -b, --battlemetrics-id <id>   BattleMetrics server ID
  -s, --steam-id <id...>        Steam ID(s), aliases or profile URLs to inspect
  -r, --recursive-depth <n>     How deep the recursive search can go (default 5)
  -c, --comments                Search through profile comments
  -p, --comment-pages <n>       Comment pages to read per profile (default 1)
  -o, --output <file>           Graph output file (default team_network.html)
      --strategy <name>         depth-first (default) or breadth-first
      --concurrency <n>         Profiles crawled in parallel (default 1)
      --config <file>           Saved run configuration (default squadtrace.json)
  -d, --debug                   Enable debug output
  -h, --help                    Show this help`;

export interface CliOptions {
  battlemetricsId?: string;
  steamIds?: string[];
  recursiveDepth?: number;
  comments: boolean;
  commentPages?: number;
  output?: string;
  strategy?: TraversalStrategy;
  concurrency?: number;
  configFile?: string;
  debug: boolean;
  help: boolean;
}

const parseCount = (flag: string, value: string, min: number): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigurationError(`${flag} expects an integer >= ${min}, got '${value}'`);
  }
  return parsed;
};

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { comments: false, debug: false, help: false };
  const args = [...argv];

  while (args.length > 0) {
    const arg = args.shift() ?? '';
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);

    const takeValue = (): string => {
      const value = inline ?? args.shift();
      if (value === undefined || (inline === undefined && value.startsWith('-'))) {
        throw new ConfigurationError(`${flag} expects a value`);
      }
      return value;
    };

    switch (flag) {
      case '-b':
      case '--battlemetrics-id':
        options.battlemetricsId = takeValue();
        break;
      case '-s':
      case '--steam-id': {
        const ids = inline !== undefined ? [inline] : [];
        while (args.length > 0 && !args[0].startsWith('-')) {
          ids.push(args.shift() ?? '');
        }
        if (ids.length === 0) throw new ConfigurationError(`${flag} expects at least one value`);
        options.steamIds = [...(options.steamIds ?? []), ...ids];
        break;
      }
      case '-r':
      case '--recursive-depth':
        options.recursiveDepth = parseCount(flag, takeValue(), 0);
        break;
      case '-c':
      case '--comments':
        options.comments = true;
        break;
      case '-p':
      case '--comment-pages':
        options.commentPages = parseCount(flag, takeValue(), 0);
        break;
      case '-o':
      case '--output':
        options.output = takeValue();
        break;
      case '--strategy': {
        const strategy = takeValue();
        if (strategy !== 'depth-first' && strategy !== 'breadth-first') {
          throw new ConfigurationError(`--strategy must be depth-first or breadth-first, got '${strategy}'`);
        }
        options.strategy = strategy;
        break;
      }
      case '--concurrency':
        options.concurrency = parseCount(flag, takeValue(), 1);
        break;
      case '--config':
        options.configFile = takeValue();
        break;
      case '-d':
      case '--debug':
        options.debug = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      default:
        throw new ConfigurationError(`Unknown option '${arg}'`);
    }
  }

  return options;
}
