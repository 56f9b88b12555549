import { describe, it, expect } from 'vitest';
import { InvalidStepError } from '../errors.js';
import { createDefaultRegistry, StepRegistry } from './registry.js';

describe('StepRegistry', () => {
  const registry = createDefaultRegistry();

  it('lists the pipeline steps in execution order', () => {
    expect(registry.list().map((step) => step.name)).toEqual([
      'site',
      'streets',
      'clusters',
      'public',
      'subdivision',
      'footprint',
      'building_start',
      'building_max',
    ]);
    expect(registry.list().map((step) => step.index)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    expect(registry.length).toBe(8);
  });

  it('expects geojson then gltf from every step', () => {
    for (const step of registry.list()) {
      expect(step.extensions).toEqual(['geojson', 'gltf']);
    }
  });

  it('resolves steps by index and by name', () => {
    expect(registry.get(1)).toBe(registry.get('streets'));
    expect(registry.find('public')?.index).toBe(3);
    expect(registry.at(8)).toBeUndefined();
  });

  it('builds two-digit folder names', () => {
    expect(registry.folderName(0)).toBe('00-site');
    expect(registry.folderName('building_max')).toBe('07-building_max');
  });

  it('rejects unknown steps', () => {
    expect(() => registry.get(8)).toThrow(InvalidStepError);
    expect(() => registry.get(-1)).toThrow(InvalidStepError);
    expect(() => registry.get('roads')).toThrow('Unknown pipeline step: roads');
    expect(registry.has(1.5)).toBe(false);
  });

  it('is immutable', () => {
    expect(Object.isFrozen(registry.list())).toBe(true);
    expect(Object.isFrozen(registry.get(0))).toBe(true);
    expect(Object.isFrozen(registry.get(0).extensions)).toBe(true);
  });

  it('refuses duplicate step names', () => {
    expect(
      () =>
        new StepRegistry([
          { name: 'site', label: 'Site', extensions: ['geojson'] },
          { name: 'site', label: 'Site again', extensions: ['geojson'] },
        ]),
    ).toThrow('Pipeline step names must be unique');
  });
});
