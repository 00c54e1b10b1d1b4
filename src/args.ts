/**
 * Command line argument parsing
 */

import type { ExtractionStrategy } from '../schemas/index.js';

export interface CliArgs {
  sheet?: string;
  spreadsheetId?: string;
  name?: string;
  strategy?: ExtractionStrategy;
  year?: number;
  config?: string;
  output?: string;
  dryRun: boolean;
  help: boolean;
}

const STRATEGIES: readonly ExtractionStrategy[] = ['columns', 'search'];

function isStrategy(value: string): value is ExtractionStrategy {
  return STRATEGIES.some((strategy) => strategy === value);
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`${flag} requires a value`);
  }
  return value;
}

/**
 * Parse CLI arguments (without the node/script prefix)
 *
 * @throws Error on unknown flags or missing/invalid values
 */
export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = { dryRun: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--sheet':
        result.sheet = requireValue(arg, nextArg);
        i++;
        break;
      case '--spreadsheet-id':
        result.spreadsheetId = requireValue(arg, nextArg);
        i++;
        break;
      case '--name':
        result.name = requireValue(arg, nextArg);
        i++;
        break;
      case '--strategy': {
        const value = requireValue(arg, nextArg);
        if (!isStrategy(value)) {
          throw new Error(`--strategy must be one of: ${STRATEGIES.join(', ')}`);
        }
        result.strategy = value;
        i++;
        break;
      }
      case '--year': {
        const value = requireValue(arg, nextArg);
        if (!/^\d{4}$/.test(value) || parseInt(value, 10) < 1970) {
          throw new Error(`--year must be a four-digit year, got "${value}"`);
        }
        result.year = parseInt(value, 10);
        i++;
        break;
      }
      case '--config':
        result.config = requireValue(arg, nextArg);
        i++;
        break;
      case '--output':
        result.output = requireValue(arg, nextArg);
        i++;
        break;
      case '--dry-run':
        result.dryRun = true;
        break;
      case '--help':
        result.help = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  if (result.sheet && result.spreadsheetId) {
    throw new Error('Use either --sheet or --spreadsheet-id, not both');
  }

  return result;
}

export const HELP_TEXT = `
Workshift Calendar CLI

Copies a person's workshifts from a Google Sheets shift plan into Google Calendar.

Usage:
  npx tsx src/run.ts [options]

Options:
  --sheet <title>          Spreadsheet title in Google Drive (prompted if omitted)
  --spreadsheet-id <id>    Spreadsheet ID (skips the Drive title lookup)
  --name <full name>       Worker's first and last name (prompted if omitted)
  --strategy <name>        columns (accent-insensitive, default) or search (exact)
  --year <n>               Year of the plan's day labels (default: current year)
  --config <path>          Path to config file (default: ./config.json)
  --dry-run                Print the events without creating them
  --output <path>          Write the JSON run report to a file (default: stdout)
  --help                   Show this help message

Examples:
  npx tsx src/run.ts --sheet "Grafik marzec" --name "Jan Kowalski"
  npx tsx src/run.ts --spreadsheet-id 1AbC --name "Jan Kowalski" --strategy search --dry-run
`;
