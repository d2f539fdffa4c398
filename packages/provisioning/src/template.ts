import type { Machine } from '@rackpower/core';

const MACHINE_VARIABLE = /\{\{\s*machine((?:\.\w+)*)\s*\}\}/g;

function lookupPath(root: unknown, path: string[]): unknown {
  let current: unknown = root;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

function renderValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/**
 * Substitutes `{{ machine.<path> }}` placeholders in a DHCP filename pattern.
 * A bare `{{ machine }}` renders the fqdn; unknown paths render empty.
 */
export function renderMachineTemplate(pattern: string, machine: Machine): string {
  return pattern.replace(MACHINE_VARIABLE, (_match, dotted: string) => {
    if (!dotted) return machine.fqdn;
    return renderValue(lookupPath(machine, dotted.slice(1).split('.')));
  });
}
