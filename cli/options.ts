import { Command, InvalidArgumentError } from 'commander';
import type { AppConfig } from './config.js';
import { ALL_CONTAINERS } from './types.js';
import type { ContainerId, SearchOptions } from './types.js';

type CliFlags = {
  apiKey?: string;
  character?: string | true;
  bank?: true;
  shared?: true;
  materials?: true;
  legendary?: true;
  rarity?: string;
  slot?: string;
  type?: string;
  weight?: string;
  regex?: true;
  maxIds?: number;
  json?: true;
  verbose?: true;
  debug?: true;
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function regexProblem(pattern: string): string | undefined {
  try {
    new RegExp(pattern, 'i');
    return undefined;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
}

export function buildProgram(): Command {
  return new Command()
    .name('gw2-find')
    .description('Find where items live across the characters, bank and storage of a Guild Wars 2 account')
    .argument('[item-name]', 'item name to look for (exact, case-insensitive)')
    .option('-k, --api-key <key>', 'API key with account, characters and inventories permissions (or GW2_API_KEY)')
    .option('-c, --character [name]', 'search characters; optionally only the named one ("all" for every character)')
    .option('-b, --bank', 'search the bank')
    .option('-s, --shared', 'search the shared inventory slots')
    .option('-m, --materials', 'search material storage')
    .option('-l, --legendary', 'search the legendary armory')
    .option('-r, --rarity <rarity>', 'only items of this rarity')
    .option('--slot <regex>', 'only items equipped in a slot matching this pattern')
    .option('-t, --type <type>', 'only items of this type or subtype')
    .option('-w, --weight <class>', 'only armor of this weight class')
    .option('-x, --regex', 'treat the item name as a regular expression')
    .option('--max-ids <count>', 'item ids per lookup request (at most 200)', parsePositiveInt)
    .option('--json', 'print results as JSON')
    .option('-v, --verbose', 'log progress')
    .option('-d, --debug', 'log every request');
}

export function selectedContainers(flags: CliFlags): ContainerId[] {
  const selected: ContainerId[] = [];
  if (flags.character !== undefined) {
    selected.push('characters');
  }
  if (flags.bank) {
    selected.push('bank');
  }
  if (flags.shared) {
    selected.push('sharedInventory');
  }
  if (flags.materials) {
    selected.push('materials');
  }
  if (flags.legendary) {
    selected.push('legendaryArmory');
  }
  return selected.length > 0 ? selected : [...ALL_CONTAINERS];
}

export function parseCliOptions(argv: string[], config: AppConfig, program: Command = buildProgram()): SearchOptions {
  program.parse(argv, { from: 'user' });
  const flags = program.opts<CliFlags>();
  const itemName = program.args.length > 0 ? program.args[0] : undefined;

  const apiKey = flags.apiKey ?? config.apiKey;
  if (!apiKey) {
    program.error('error: an API key is required (--api-key or GW2_API_KEY)');
  }

  const regex = flags.regex === true;
  if (regex && itemName !== undefined) {
    const problem = regexProblem(itemName);
    if (problem) {
      program.error(`error: invalid item name pattern: ${problem}`);
    }
  }
  if (flags.slot !== undefined) {
    const problem = regexProblem(flags.slot);
    if (problem) {
      program.error(`error: invalid slot pattern: ${problem}`);
    }
  }

  return {
    apiKey,
    containers: selectedContainers(flags),
    character: typeof flags.character === 'string' ? flags.character : undefined,
    filters: {
      itemName,
      regex,
      rarity: flags.rarity,
      type: flags.type,
      weightClass: flags.weight,
      slot: flags.slot,
    },
    maxItemsPerRequest: flags.maxIds,
    json: flags.json === true,
    verbose: flags.verbose === true,
    debug: flags.debug === true,
  };
}
