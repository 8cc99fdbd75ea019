import { Logger } from '../lib/logger.js';
import { describeLocation } from './locations.js';
import type { FoundItems, ItemDefinition } from '../types.js';

export const NO_MATCH_MESSAGE = 'No matching items found.';

const log = Logger.scope('render');

function sortedNames(found: FoundItems): string[] {
  return [...found.keys()].sort();
}

function nameLookup(definitions: ReadonlyMap<number, ItemDefinition>): (id: number) => string | undefined {
  return (id) => definitions.get(id)?.name;
}

export function renderText(found: FoundItems, definitions: ReadonlyMap<number, ItemDefinition>): string {
  if (found.size === 0) {
    return NO_MATCH_MESSAGE;
  }

  const nameOf = nameLookup(definitions);
  const lines: string[] = [];
  for (const name of sortedNames(found)) {
    lines.push(name);
    for (const details of found.get(name) ?? []) {
      lines.push(`  ${describeLocation(details.location, nameOf)}`);
    }
  }
  return lines.join('\n');
}

export function renderJson(found: FoundItems, definitions: ReadonlyMap<number, ItemDefinition>): string {
  const nameOf = nameLookup(definitions);
  const output: Record<string, string[]> = {};
  for (const name of sortedNames(found)) {
    output[name] = (found.get(name) ?? []).map((details) => describeLocation(details.location, nameOf));
  }
  return JSON.stringify(output, null, 2);
}

// JSON output stays parseable on stdout; the empty result is reported on the log instead.
export function renderResults(
  found: FoundItems,
  definitions: ReadonlyMap<number, ItemDefinition>,
  json: boolean,
): string {
  if (!json) {
    return renderText(found, definitions);
  }
  if (found.size === 0) {
    log.warn(NO_MATCH_MESSAGE);
  }
  return renderJson(found, definitions);
}
