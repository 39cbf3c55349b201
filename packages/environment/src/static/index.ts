/**
 * In-memory environment state
 *
 * Fields are constants or functions of position. Interference sources are
 * indexed in a spatial hash for radius queries. Positions outside the
 * optional bounds, and unknown fields, raise EnvironmentQueryMiss.
 */

import { pointInBoundingBox3D, type BoundingBox3D, type Position3D } from '@sensim/core';
import { EnvironmentQueryMiss, type EnvironmentQuery, type FieldValue, type InterferenceSource } from '../query/index.js';
import { SpatialHash3D } from '../spatial/index.js';

/** A field: a uniform value, or a function of position */
export type FieldDefinition = FieldValue | ((position: Position3D) => FieldValue | undefined);

export interface StaticEnvironmentOptions {
  fields?: Record<string, FieldDefinition>;
  sources?: readonly InterferenceSource[];
  /** Queries outside these bounds miss */
  bounds?: BoundingBox3D;
  /** Spatial hash cell size in meters (default 25) */
  cellSize?: number;
}

const DEFAULT_CELL_SIZE = 25;

/**
 * Mutable in-memory environment. The scenario driver updates it between
 * timesteps; sensors only read it.
 */
export class StaticEnvironment implements EnvironmentQuery {
  private readonly fields = new Map<string, FieldDefinition>();
  private readonly sources: SpatialHash3D<InterferenceSource>;
  private readonly bounds: BoundingBox3D | undefined;

  constructor(options: StaticEnvironmentOptions = {}) {
    this.bounds = options.bounds;
    this.sources = new SpatialHash3D(options.cellSize ?? DEFAULT_CELL_SIZE, (source) => source.position);
    for (const [name, definition] of Object.entries(options.fields ?? {})) {
      this.fields.set(name, definition);
    }
    this.sources.insertAll(options.sources ?? []);
  }

  // ==========================================================================
  // EnvironmentQuery
  // ==========================================================================

  getFieldValue(fieldName: string, position: Position3D): FieldValue | undefined {
    this.assertInBounds(position, fieldName);
    const definition = this.fields.get(fieldName);
    if (definition === undefined) {
      throw new EnvironmentQueryMiss('unknown_field', fieldName, position);
    }
    return typeof definition === 'function' ? definition(position) : definition;
  }

  getNearbySources(position: Position3D, radius: number): InterferenceSource[] {
    this.assertInBounds(position, undefined);
    return this.sources.queryRadius(position, radius).map((hit) => hit.item);
  }

  // ==========================================================================
  // Mutation (scenario driver only)
  // ==========================================================================

  /** Set or replace a field */
  setField(fieldName: string, definition: FieldDefinition): this {
    this.fields.set(fieldName, definition);
    return this;
  }

  /** Remove a field; later queries for it miss */
  removeField(fieldName: string): this {
    this.fields.delete(fieldName);
    return this;
  }

  /** Add an interference source */
  addSource(source: InterferenceSource): this {
    this.sources.insert(source);
    return this;
  }

  /** Remove all interference sources */
  clearSources(): this {
    this.sources.clear();
    return this;
  }

  /** Names of defined fields */
  get fieldNames(): string[] {
    return [...this.fields.keys()];
  }

  /** Number of interference sources */
  get sourceCount(): number {
    return this.sources.size;
  }

  private assertInBounds(position: Position3D, fieldName: string | undefined): void {
    if (this.bounds && !pointInBoundingBox3D(position, this.bounds)) {
      throw new EnvironmentQueryMiss('out_of_range', fieldName, position);
    }
  }
}
