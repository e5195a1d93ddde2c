import { describe, it, expect } from 'vitest';
import { buildRegistry, UnitRegistry } from '../../src/registry/registry.js';
import { ScanError, UnitNotFoundError } from '../../src/errors.js';
import { ContextLogger } from '../../src/observability/context-logger.js';
import type { UnitSource } from '../../src/registry/types.js';
import { buildUnit } from '../../src/registry/loader.js';
import { createBufferOutput, createMemorySource, makeUnit, parseLines, SCAN_OPTIONS } from '../helpers.js';

const noop = (): void => undefined;

describe('UnitRegistry', () => {
  it('is empty by default', () => {
    const registry = new UnitRegistry();
    expect(registry.isEmpty).toBe(true);
    expect(registry.size).toBe(0);
    expect(registry.names).toEqual([]);
    expect(registry.errors).toEqual([]);
    expect(registry.policy).toBe('numeric-id');
  });

  it('applies the ordering policy on construction', () => {
    const registry = new UnitRegistry({
      units: [makeUnit('B', noop, { order: 5 }), makeUnit('A', noop, { order: 1 }), makeUnit('C', noop, { order: 5 })],
      policy: 'priority',
    });
    expect(registry.names).toEqual(['A', 'B', 'C']);
    expect(registry.list().map((u) => u.order)).toEqual([1, 5, 5]);
  });

  it('keeps the later unit on a display name collision', () => {
    const replaced: string[] = [];
    const first = makeUnit('Same', noop, { candidate: 'code1.js' });
    const second = makeUnit('Same', noop, { candidate: 'code2.js' });
    const registry = new UnitRegistry({
      units: [first, second],
      onReplace: (old, by) => replaced.push(`${old.candidate}->${by.candidate}`),
    });
    expect(registry.size).toBe(1);
    expect(registry.get('Same')).toBe(second);
    expect(replaced).toEqual(['code1.js->code2.js']);
  });

  it('get returns null and require throws for unknown names', () => {
    const registry = new UnitRegistry({ units: [makeUnit('Known', noop)] });
    expect(registry.get('Unknown')).toBeNull();
    expect(registry.has('Known')).toBe(true);
    expect(() => registry.require('Unknown')).toThrow(UnitNotFoundError);
    expect(registry.require('Known').displayName).toBe('Known');
  });

  it('exposes entries in display order', () => {
    const registry = new UnitRegistry({
      units: [makeUnit('Two', noop, { numericId: 2 }), makeUnit('One', noop, { numericId: 1 })],
    });
    expect([...registry.entries()].map(([name]) => name)).toEqual(['One', 'Two']);
  });

  it('freezes the error list', () => {
    const registry = new UnitRegistry({
      errors: [{ candidate: 'code1.js', kind: 'load_exception', message: 'boom' }],
    });
    expect(Object.isFrozen(registry.errors)).toBe(true);
  });
});

describe('buildRegistry', () => {
  it('produces an empty registry for a source with no candidates', async () => {
    const registry = await buildRegistry(createMemorySource());
    expect(registry.isEmpty).toBe(true);
    expect(registry.errors).toEqual([]);
  });

  it('excludes a unit without run and records one missing-entry-point error', async () => {
    const source = createMemorySource()
      .register('code1.js', { name: 'No Run' })
      .register('code2.js', { run: noop });
    const registry = await buildRegistry(source);
    expect(registry.names).toEqual(['Code2']);
    expect(registry.errors).toEqual([
      { candidate: 'code1.js', kind: 'missing_entry_point', message: "Unit 'code1.js' missing required 'run()' function" },
    ]);
  });

  it('excludes a unit whose run is not callable with a different message', async () => {
    const source = createMemorySource().register('code5.js', { run: 'not a function' });
    const registry = await buildRegistry(source);
    expect(registry.isEmpty).toBe(true);
    expect(registry.errors).toEqual([
      { candidate: 'code5.js', kind: 'not_callable', message: "Unit 'code5.js' has 'run' but it is not callable (got string)" },
    ]);
  });

  it('records invalid metadata and keeps going', async () => {
    const source = createMemorySource()
      .register('code1.js', { run: noop, order: 'high' })
      .register('code2.js', { run: noop, name: 'Fine' });
    const registry = await buildRegistry(source);
    expect(registry.names).toEqual(['Fine']);
    expect(registry.errors).toHaveLength(1);
    expect(registry.errors[0].kind).toBe('invalid_metadata');
    expect(registry.errors[0].candidate).toBe('code1.js');
  });

  it('resolves display name collisions last-write-wins without a load error', async () => {
    const earlier = (): string => 'earlier';
    const later = (): string => 'later';
    const source = createMemorySource()
      .register('code1.js', { name: 'Exporter', run: earlier })
      .register('code2.js', { name: 'Exporter', run: later });
    const registry = await buildRegistry(source);
    expect(registry.size).toBe(1);
    expect(registry.require('Exporter').candidate).toBe('code2.js');
    expect(registry.require('Exporter').run()).toBe('later');
    expect(registry.errors).toEqual([]);
  });

  it('accepts class instances whose run lives on the prototype', async () => {
    class LabelPrinter {
      readonly name = 'Label Printer';
      printed = 0;
      run(): void {
        this.printed++;
      }
    }
    const printer = new LabelPrinter();
    const registry = await buildRegistry(createMemorySource().register('code3.js', printer));
    await registry.require('Label Printer').run();
    expect(printer.printed).toBe(1);
  });

  it('orders numerically by file name under the default policy', async () => {
    const source = createMemorySource()
      .register('code10.js', { run: noop, order: 1 })
      .register('code2.js', { run: noop });
    const registry = await buildRegistry(source);
    expect(registry.names).toEqual(['Code2', 'Code10']);
  });

  it('orders by declared order under the priority policy', async () => {
    const source = createMemorySource()
      .register('code10.js', { run: noop, order: 1 })
      .register('code2.js', { run: noop });
    const registry = await buildRegistry(source, { policy: 'priority' });
    expect(registry.names).toEqual(['Code10', 'Code2']);
  });

  it('turns a throwing load into a load_exception error', async () => {
    const source: UnitSource = {
      listCandidates: () => [
        { name: 'code1.js', filePath: 'code1.js', metaPath: null },
        { name: 'code2.js', filePath: 'code2.js', metaPath: null },
      ],
      load: async (candidate) => {
        if (candidate.name === 'code1.js') throw new Error('disk on fire');
        return buildUnit({ run: noop }, candidate, SCAN_OPTIONS);
      },
    };
    const registry = await buildRegistry(source);
    expect(registry.errors).toEqual([
      {
        candidate: 'code1.js',
        kind: 'load_exception',
        message: "Failed to load 'code1.js': disk on fire",
        trace: expect.stringMatching(/^Error: disk on fire\n/),
      },
    ]);
    expect(registry.names).toEqual(['Code2']);
  });

  it('propagates a listing failure', async () => {
    const source: UnitSource = {
      listCandidates: () => {
        throw new ScanError('/srv/units');
      },
      load: async () => ({ ok: false, error: { candidate: '', kind: 'load_exception', message: '' } }),
    };
    await expect(buildRegistry(source)).rejects.toThrow(ScanError);
  });

  it('logs load errors, collisions and a summary', async () => {
    const { output, lines } = createBufferOutput();
    const logger = new ContextLogger({ output, level: 'debug' });
    const source = createMemorySource()
      .register('code1.js', { name: 'Dup', run: noop })
      .register('code2.js', { name: 'Dup', run: noop })
      .register('code3.js', {});
    await buildRegistry(source, { logger });

    const entries = parseLines(lines);
    expect(entries.map((e) => e.message)).toEqual([
      'Unit failed to load',
      'Display name collision, later candidate replaces earlier',
      'Unit discovery complete',
    ]);
    expect(entries[0].extra).toEqual({
      candidate: 'code3.js',
      kind: 'missing_entry_point',
      reason: "Unit 'code3.js' missing required 'run()' function",
    });
    expect(entries[1].extra).toEqual({ display_name: 'Dup', replaced: 'code1.js', by: 'code2.js' });
    expect(entries[2].extra).toEqual({ candidates: 3, loaded: 1, errors: 1, policy: 'numeric-id' });
  });

  it('logs the stack of a load exception', async () => {
    const { output, lines } = createBufferOutput();
    const source: UnitSource = {
      listCandidates: () => [{ name: 'code1.js', filePath: 'code1.js', metaPath: null }],
      load: async () => {
        throw new Error('disk on fire');
      },
    };
    await buildRegistry(source, { logger: new ContextLogger({ output, level: 'warn' }) });

    const entries = parseLines(lines);
    expect(entries).toHaveLength(1);
    expect(entries[0].message).toBe('Unit failed to load');
    expect(entries[0].extra).toEqual({
      candidate: 'code1.js',
      kind: 'load_exception',
      reason: "Failed to load 'code1.js': disk on fire",
      trace: expect.stringMatching(/^Error: disk on fire\n/),
    });
  });
});
