import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { ZodIssue } from 'zod';
import { countersSchema } from '../../application/status-schema.js';
import type { ModuleReading } from '../modules/index.js';

/**
 * Service configuration loaded from YAML.
 *
 * `telemetry` is a reserved section; every other top-level section
 * describes the wiring of one module:
 *
 *   certsig:
 *     active: true
 *     signatures_processed: 12
 */
export interface DalsFileConfig {
  telemetry: { enabled: boolean; interval_seconds: number };
  modules: Record<string, ModuleReading>;
  /** Counter validation issues per module whose counters were dropped. */
  counterIssues: Record<string, ZodIssue[]>;
}

/**
 * Default configuration — telemetry on every 30 s, no module wired.
 */
export const DEFAULT_FILE_CONFIG: DalsFileConfig = {
  telemetry: { enabled: true, interval_seconds: 30 },
  modules: {},
  counterIssues: {},
};

type Scalar = string | number | boolean;

const NUMBER_RE = /^-?\d+(?:\.\d+)?$/;

function parseScalar(raw: string): Scalar {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (raw === '""' || raw === "''") return '';
  if (NUMBER_RE.test(raw)) return Number(raw);
  if (raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')) return raw.slice(1, -1);
  return raw;
}

/**
 * Minimal YAML parser for a two-level section/key structure.
 *
 * Handles top-level keys with indented scalar values and `#` comments.
 * Not a general-purpose YAML parser.
 */
export function parseSimpleYaml(content: string): Record<string, Record<string, Scalar>> {
  const result: Record<string, Record<string, Scalar>> = {};
  let section: Record<string, Scalar> | null = null;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    if (line.trim() === '' || line.trim().startsWith('#')) continue;

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
    const value = line.slice(colonIdx + 1).trim();
    section[key] = parseScalar(value);
  }

  return result;
}

function toModuleReading(
  section: Record<string, Scalar>,
): { reading: ModuleReading; issues: ZodIssue[] } {
  const counters: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(section)) {
    if (key !== 'active') counters[key] = value;
  }

  const parsed = countersSchema.safeParse(counters);

  return {
    reading: {
      active: section['active'] === true,
      counters: parsed.success ? parsed.data : {},
    },
    issues: parsed.success ? [] : parsed.error.issues,
  };
}

/**
 * Loads the YAML configuration.
 *
 * Falls back to DEFAULT_FILE_CONFIG if the file is missing or unreadable.
 * Missing keys get default values; a module whose counters are not all
 * numbers is loaded with no counters and its issues are reported in
 * `counterIssues`.
 */
export function loadFileConfig(configPath?: string): DalsFileConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'modules.yaml');

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    return {
      telemetry: { ...DEFAULT_FILE_CONFIG.telemetry },
      modules: {},
      counterIssues: {},
    };
  }

  const parsed = parseSimpleYaml(content);
  const telemetry = parsed['telemetry'] ?? {};
  const interval = telemetry['interval_seconds'];

  const modules: Record<string, ModuleReading> = {};
  const counterIssues: Record<string, ZodIssue[]> = {};
  for (const [name, section] of Object.entries(parsed)) {
    if (name === 'telemetry') continue;
    const { reading, issues } = toModuleReading(section);
    modules[name] = reading;
    if (issues.length > 0) counterIssues[name] = issues;
  }

  return {
    telemetry: {
      enabled: typeof telemetry['enabled'] === 'boolean'
        ? telemetry['enabled']
        : DEFAULT_FILE_CONFIG.telemetry.enabled,
      interval_seconds: typeof interval === 'number' && interval >= 1
        ? interval
        : DEFAULT_FILE_CONFIG.telemetry.interval_seconds,
    },
    modules,
    counterIssues,
  };
}
