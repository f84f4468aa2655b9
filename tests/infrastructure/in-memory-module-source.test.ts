import { describe, it, expect } from 'vitest';
import { InMemoryModuleStateSource } from '../../src/infrastructure/modules/in-memory-module-source.js';

describe('InMemoryModuleStateSource', () => {
  it('reads unknown modules as unwired', () => {
    const source = new InMemoryModuleStateSource();
    expect(source.read('caleon')).toEqual({ active: false, counters: {} });
  });

  it('returns seeded readings', () => {
    const source = new InMemoryModuleStateSource({
      iss: { active: true, counters: { log_entries: 3 } },
    });
    expect(source.read('iss')).toEqual({ active: true, counters: { log_entries: 3 } });
  });

  it('copies seed counters', () => {
    const counters = { log_entries: 3 };
    const source = new InMemoryModuleStateSource({ iss: { active: true, counters } });
    counters.log_entries = 99;
    expect(source.read('iss').counters).toEqual({ log_entries: 3 });
  });

  it('setActive keeps existing counters', () => {
    const source = new InMemoryModuleStateSource({
      certsig: { active: false, counters: { signatures_processed: 8 } },
    });

    source.setActive('certsig', true);

    expect(source.read('certsig')).toEqual({ active: true, counters: { signatures_processed: 8 } });
  });

  it('setCounters keeps the active flag', () => {
    const source = new InMemoryModuleStateSource();
    source.setActive('caleon', true);
    source.setCounters('caleon', { cycles_completed: 4 });

    expect(source.read('caleon')).toEqual({ active: true, counters: { cycles_completed: 4 } });
  });
});
