/**
 * `--list`: print the port catalogue of a namespace and exit.
 */

import type { PortEntry } from '@portshift/core';
import { DIM, RESET, kvRow, sectionHeader } from './ui.js';

export function formatCatalogue(namespace: string, entries: readonly PortEntry[], width = 60): string[] {
  const services = new Set(entries.map((e) => e.serviceName)).size;
  const lines = [sectionHeader(`Namespace ${namespace}`, width)];

  if (entries.length === 0) {
    lines.push(`  ${DIM}No services expose ports.${RESET}`);
    return lines;
  }

  let current: string | null = null;
  for (const entry of entries) {
    if (entry.serviceName !== current) {
      current = entry.serviceName;
      lines.push('', `  ${current}`);
    }
    lines.push(kvRow(`  ${entry.label}`, `${entry.remotePort}/${entry.protocol}`, 16));
  }

  lines.push('', `  ${DIM}${services} service(s), ${entries.length} port(s)${RESET}`);
  return lines;
}
