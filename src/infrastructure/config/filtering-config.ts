import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

/**
 * Filtering configuration loaded from YAML.
 */
export interface FilteringConfig {
  alerts: { enabled: boolean; webhook_url: string };
  moderation: { guild_id: string; channel_id: string };
  dm: { colour: number };
}

/** Blurple DM embeds, alerts on but without a webhook until one is configured. */
export const DEFAULT_CONFIG: FilteringConfig = {
  alerts: { enabled: true, webhook_url: '' },
  moderation: { guild_id: '', channel_id: '' },
  dm: { colour: 0x7289da },
};

type YamlSection = Record<string, string | boolean>;

/**
 * Minimal YAML reader for the flat filtering config structure.
 *
 * Handles only the subset used in config/filtering.yaml: top-level keys
 * with indented scalar values. Not a general-purpose YAML parser.
 */
function parseSimpleYaml(content: string): Record<string, YamlSection> {
  const result: Record<string, YamlSection> = {};
  let section: YamlSection | null = null;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    if (line === '' || line.trimStart().startsWith('#')) continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;

    // Top-level key (no leading whitespace)
    if (!line.startsWith(' ') && !line.startsWith('\t')) {
      section = {};
      result[line.slice(0, colonIdx).trim()] = section;
      continue;
    }

    if (section === null) continue;

    const key = line.slice(0, colonIdx).trim();
    const raw = line.slice(colonIdx + 1).trim();
    if (raw === 'true' || raw === 'false') {
      section[key] = raw === 'true';
    } else if (raw.length >= 2 && /^(".*"|'.*')$/.test(raw)) {
      section[key] = raw.slice(1, -1);
    } else {
      section[key] = raw;
    }
  }

  return result;
}

function readBoolean(section: YamlSection, key: string, fallback: boolean): boolean {
  const value = section[key];
  return typeof value === 'boolean' ? value : fallback;
}

function readString(section: YamlSection, key: string, fallback: string): string {
  const value = section[key];
  return typeof value === 'string' ? value : fallback;
}

/** Accepts decimal or `0x`-prefixed hex. */
function readColour(section: YamlSection, key: string, fallback: number): number {
  const value = section[key];
  if (typeof value !== 'string' || value === '') return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 && parsed <= 0xffffff ? parsed : fallback;
}

/**
 * Loads filtering configuration from the YAML file.
 *
 * Falls back to DEFAULT_CONFIG if the file is missing.
 * Merges loaded values over defaults so missing keys get default values.
 */
export function loadFilteringConfig(configPath?: string): FilteringConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'filtering.yaml');

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = parseSimpleYaml(content);
  const alerts = parsed['alerts'] ?? {};
  const moderation = parsed['moderation'] ?? {};
  const dm = parsed['dm'] ?? {};

  return {
    alerts: {
      enabled: readBoolean(alerts, 'enabled', DEFAULT_CONFIG.alerts.enabled),
      webhook_url: readString(alerts, 'webhook_url', DEFAULT_CONFIG.alerts.webhook_url),
    },
    moderation: {
      guild_id: readString(moderation, 'guild_id', DEFAULT_CONFIG.moderation.guild_id),
      channel_id: readString(moderation, 'channel_id', DEFAULT_CONFIG.moderation.channel_id),
    },
    dm: {
      colour: readColour(dm, 'colour', DEFAULT_CONFIG.dm.colour),
    },
  };
}
