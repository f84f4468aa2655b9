import { describe, it, expect, afterEach } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import {
  loadFileConfig,
  parseSimpleYaml,
  DEFAULT_FILE_CONFIG,
} from '../../src/infrastructure/config/file-config.js';

const TMP_DIR = join(process.cwd(), '.tmp-test-file-config');

function writeTmpYaml(content: string): string {
  mkdirSync(TMP_DIR, { recursive: true });
  const path = join(TMP_DIR, 'modules.yaml');
  writeFileSync(path, content, 'utf-8');
  return path;
}

describe('parseSimpleYaml', () => {
  it('parses sections with scalar values', () => {
    const parsed = parseSimpleYaml(
      ['# comment', 'telemetry:', '  enabled: false', '  interval_seconds: 5', '', 'iss:', '  label: "main"'].join('\n'),
    );

    expect(parsed).toEqual({
      telemetry: { enabled: false, interval_seconds: 5 },
      iss: { label: 'main' },
    });
  });

  it('ignores indented keys before any section', () => {
    expect(parseSimpleYaml('  orphan: 1\nsection:\n  key: value\n')).toEqual({
      section: { key: 'value' },
    });
  });
});

describe('loadFileConfig', () => {
  afterEach(() => {
    rmSync(TMP_DIR, { recursive: true, force: true });
  });

  it('returns defaults when file does not exist', () => {
    expect(loadFileConfig('/nonexistent/modules.yaml')).toEqual(DEFAULT_FILE_CONFIG);
  });

  it('returns defaults for empty file', () => {
    expect(loadFileConfig(writeTmpYaml(''))).toEqual(DEFAULT_FILE_CONFIG);
  });

  it('reads telemetry settings', () => {
    const config = loadFileConfig(writeTmpYaml('telemetry:\n  enabled: false\n  interval_seconds: 10\n'));
    expect(config.telemetry).toEqual({ enabled: false, interval_seconds: 10 });
  });

  it('falls back to the default interval for values below one second', () => {
    const config = loadFileConfig(writeTmpYaml('telemetry:\n  interval_seconds: 0\n'));
    expect(config.telemetry.interval_seconds).toBe(30);
  });

  it('reads module wiring and raw counters', () => {
    const path = writeTmpYaml(
      'certsig:\n  active: false\n  signatures_processed: 42\n\ncaleon:\n  active: true\n',
    );

    expect(loadFileConfig(path).modules).toEqual({
      certsig: { active: false, counters: { signatures_processed: 42 } },
      caleon: { active: true, counters: {} },
    });
  });

  it('drops counters that are not all numbers', () => {
    const path = writeTmpYaml('iss:\n  active: true\n  log_entries: lots\n  modules_loaded: 3\n');
    const config = loadFileConfig(path);

    expect(config.modules['iss']).toEqual({ active: true, counters: {} });
    expect(config.counterIssues['iss']).toHaveLength(1);
    expect(config.counterIssues['iss']?.[0]?.path).toEqual(['log_entries']);
  });

  it('reports no counter issues for valid modules', () => {
    const path = writeTmpYaml('certsig:\n  active: true\n  signatures_processed: 7\n');
    expect(loadFileConfig(path).counterIssues).toEqual({});
  });

  it('treats a non-boolean active flag as inactive', () => {
    const path = writeTmpYaml('iss:\n  active: yes\n');
    expect(loadFileConfig(path).modules['iss']?.active).toBe(false);
  });
});
