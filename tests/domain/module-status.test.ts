import { describe, it, expect } from 'vitest';
import { createStatusNormalizer, normalizeStatus } from '../../src/domain/module-status.js';
import { createModuleRegistry, DEFAULT_MODULES } from '../../src/domain/modules.js';
import { UnknownModuleError } from '../../src/domain/errors.js';

const registry = createModuleRegistry();

describe('normalizeStatus', () => {
  it('zeroes supplied counters for an inactive module', () => {
    const record = normalizeStatus(registry, 'certsig', false, { signatures_processed: 42 });

    expect(record).toEqual({
      module: 'certsig',
      active: false,
      status: 'offline',
      counters: { signatures_processed: 0, certificates_minted: 0 },
    });
  });

  it('zeroes counters the registry does not declare', () => {
    const record = normalizeStatus(registry, 'caleon', false, { stale_metric: 7 });

    expect(record.counters['stale_metric']).toBe(0);
    expect(Object.values(record.counters).every((v) => v === 0)).toBe(true);
  });

  it('reports declared counters as 0 when none are supplied', () => {
    const record = normalizeStatus(registry, 'iss', false);
    expect(record.counters).toEqual({ log_entries: 0, modules_loaded: 0 });
  });

  it('passes counters through unchanged for an active module', () => {
    const counters = { signatures_processed: 42, certificates_minted: 3 };
    const record = normalizeStatus(registry, 'certsig', true, counters);

    expect(record).toEqual({
      module: 'certsig',
      active: true,
      status: 'online',
      counters: { signatures_processed: 42, certificates_minted: 3 },
    });
  });

  it('does not fill in missing counters for an active module', () => {
    const record = normalizeStatus(registry, 'prometheus', true, { reasoning_requests: 5 });
    expect(record.counters).toEqual({ reasoning_requests: 5 });
  });

  it('returns a copy of active counters', () => {
    const counters = { reasoning_requests: 5 };
    const record = normalizeStatus(registry, 'prometheus', true, counters);
    expect(record.counters).not.toBe(counters);
  });

  it('fails with UnknownModuleError for unregistered names', () => {
    expect(() => normalizeStatus(registry, 'unknown_module', false)).toThrow(UnknownModuleError);

    try {
      normalizeStatus(registry, 'unknown_module', true, { x: 1 });
      expect.unreachable();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(UnknownModuleError);
      if (err instanceof UnknownModuleError) {
        expect(err.code).toBe('UNKNOWN_MODULE');
        expect(err.moduleName).toBe('unknown_module');
        expect(err.message).toBe('Unknown module: "unknown_module"');
      }
    }
  });

  it('is case sensitive on module names', () => {
    expect(() => normalizeStatus(registry, 'CertSig', false)).toThrow(UnknownModuleError);
  });
});

describe('createStatusNormalizer', () => {
  it('uses the default registry', () => {
    const normalizer = createStatusNormalizer();
    expect([...normalizer.registry.keys()]).toEqual(DEFAULT_MODULES.map((m) => m.name));
    expect(normalizer.normalize('caleon', true).status).toBe('online');
  });

  it('accepts a custom registry', () => {
    const normalizer = createStatusNormalizer(
      createModuleRegistry([{ name: 'beacon', description: 'test beacon', counters: ['pulses'] }]),
    );

    expect(normalizer.normalize('beacon', false, { pulses: 9 }).counters).toEqual({ pulses: 0 });
    expect(() => normalizer.normalize('caleon', false)).toThrow(UnknownModuleError);
  });
});
