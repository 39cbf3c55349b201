/**
 * Unit tests for @sensim/environment static module
 */

import { describe, it, expect } from 'vitest';
import { EnvironmentQueryMiss } from '../query/index.js';
import { StaticEnvironment } from './index.js';

const origin = { x: 0, y: 0, z: 0 };

describe('StaticEnvironment fields', () => {
  it('returns uniform field values', () => {
    const env = new StaticEnvironment({ fields: { corona_discharge: 0.8 } });
    expect(env.getFieldValue('corona_discharge', origin)).toBe(0.8);
  });

  it('evaluates positional fields', () => {
    const env = new StaticEnvironment({ fields: { ac_field_strength: (p) => 10 + p.x } });
    expect(env.getFieldValue('ac_field_strength', { x: 5, y: 0, z: 0 })).toBe(15);
  });

  it('returns vector fields', () => {
    const env = new StaticEnvironment({ fields: { ac_field_vector: { x: 0, y: 0, z: -1 } } });
    expect(env.getFieldValue('ac_field_vector', origin)).toEqual({ x: 0, y: 0, z: -1 });
  });

  it('misses on an unknown field', () => {
    const env = new StaticEnvironment();
    expect(() => env.getFieldValue('arcing_intensity', origin)).toThrow(EnvironmentQueryMiss);
  });

  it('misses outside its bounds', () => {
    const env = new StaticEnvironment({
      fields: { temperature_c: 20 },
      bounds: { minX: -1, minY: -1, minZ: -1, maxX: 1, maxY: 1, maxZ: 1 },
    });
    expect(env.getFieldValue('temperature_c', origin)).toBe(20);
    try {
      env.getFieldValue('temperature_c', { x: 2, y: 0, z: 0 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(EnvironmentQueryMiss);
      if (error instanceof EnvironmentQueryMiss) {
        expect(error.reason).toBe('out_of_range');
        expect(error.fieldName).toBe('temperature_c');
      }
    }
  });

  it('supports updates between timesteps', () => {
    const env = new StaticEnvironment({ fields: { smoke_density: 0 } });
    env.setField('smoke_density', 2);
    expect(env.getFieldValue('smoke_density', origin)).toBe(2);
    env.removeField('smoke_density');
    expect(env.fieldNames).toEqual([]);
    expect(() => env.getFieldValue('smoke_density', origin)).toThrow(EnvironmentQueryMiss);
  });
});

describe('StaticEnvironment sources', () => {
  it('returns sources within the radius, nearest first', () => {
    const env = new StaticEnvironment({
      sources: [
        { position: { x: 40, y: 0, z: 0 }, frequency: 60, strength: 1 },
        { position: { x: 10, y: 0, z: 0 }, frequency: 120, strength: 2 },
        { position: { x: 100, y: 0, z: 0 }, frequency: 60, strength: 3 },
      ],
    });
    const sources = env.getNearbySources(origin, 50);
    expect(sources.map((source) => source.strength)).toEqual([2, 1]);
  });

  it('adds and clears sources', () => {
    const env = new StaticEnvironment();
    env.addSource({ position: origin, frequency: 60, strength: 1 });
    expect(env.sourceCount).toBe(1);
    env.clearSources();
    expect(env.getNearbySources(origin, 10)).toEqual([]);
  });

  it('misses source queries outside its bounds', () => {
    const env = new StaticEnvironment({ bounds: { minX: 0, minY: 0, minZ: 0, maxX: 1, maxY: 1, maxZ: 1 } });
    expect(() => env.getNearbySources({ x: -5, y: 0, z: 0 }, 10)).toThrow(EnvironmentQueryMiss);
  });
});
