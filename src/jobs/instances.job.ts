import type { Job } from 'bullmq';
import { env } from '../config/env.js';
import { instancesService } from '../services/instances.service.js';
import { logger } from '../utils/logger.js';

const MARKDOWN_LINK = /\[[^\]]*\]\(([^)\s]+)\)/;
// Splits on commas that are outside double quotes.
const CSV_SEPARATOR = /,(?=(?:[^"]*"[^"]*")*[^"]*$)/;

function unquote(field: string): string {
  const trimmed = field.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).replace(/""/g, '"');
  }
  return trimmed;
}

function linkHost(cell: string): string | null {
  const match = MARKDOWN_LINK.exec(cell);
  if (!match) return null;
  try {
    return new URL(match[1]).hostname.toLowerCase();
  } catch {
    return null;
  }
}

/**
 * Hosts named in the `Instance` column of an awesome-lemmy-instances CSV,
 * where each cell is a markdown link such as `[lemmy.ml](https://lemmy.ml)`.
 */
export function parseInstanceHosts(csv: string): string[] {
  const lines = csv.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const [header, ...rows] = lines;
  if (!header) return [];

  const column = header.split(CSV_SEPARATOR).map(unquote).indexOf('Instance');
  if (column === -1) return [];

  const hosts = new Set<string>();
  for (const row of rows) {
    const cell = row.split(CSV_SEPARATOR)[column];
    const host = cell === undefined ? null : linkHost(unquote(cell));
    if (host) hosts.add(host);
  }
  return [...hosts];
}

interface InstanceRefreshData {
  source?: string;
}

export async function processInstanceRefresh(job?: Job<InstanceRefreshData>) {
  const source = job?.data.source ?? env.INSTANCES_CSV_URL;

  logger.info({ source }, 'Refreshing instance allowlist');

  const res = await fetch(source, { signal: AbortSignal.timeout(30_000) });
  if (!res.ok) {
    throw new Error(`Instance list download failed with status ${res.status}`);
  }

  const hosts = parseInstanceHosts(await res.text());
  if (hosts.length === 0) {
    logger.warn({ source }, 'Instance list contained no instances');
    return { success: false, added: 0, parsed: 0 };
  }

  const added = await instancesService.addInstances(hosts);
  logger.info({ parsed: hosts.length, added }, 'Instance allowlist refreshed');

  return { success: true, added, parsed: hosts.length };
}
