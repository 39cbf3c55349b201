/**
 * Config migration utilities
 * Rewrites legacy key names (unit-suffixed EMF keys, "3th" harmonic names)
 * to the current configuration surface before validation.
 */

// ============================================================================
// Migration Types
// ============================================================================

type ConfigRecord = Record<string, unknown>;

/** A rewrite of one legacy construct; returns true if it changed anything */
type MigrationFn = (config: ConfigRecord) => boolean;

interface Migration {
  name: string;
  apply: MigrationFn;
}

/** Migration registry, applied in registration order */
const migrations: Migration[] = [];

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Register a legacy-config rewrite
 */
export function registerMigration(name: string, apply: MigrationFn): void {
  migrations.push({ name, apply });
}

/**
 * Rewrite legacy keys. Returns a new object; the input is not modified.
 * Non-object input is returned unchanged for the schema to reject.
 */
export function migrateLegacyConfig(config: unknown): unknown {
  return migrateLegacyConfigWithReport(config).config;
}

/**
 * Rewrite legacy keys and report which migrations changed something
 */
export function migrateLegacyConfigWithReport(config: unknown): { config: unknown; applied: string[] } {
  if (!isRecord(config)) return { config, applied: [] };

  const working = structuredClone(config);
  const applied: string[] = [];
  for (const migration of migrations) {
    if (migration.apply(working)) applied.push(migration.name);
  }
  return { config: working, applied };
}

/**
 * Check if a config uses any legacy key
 */
export function needsMigration(config: unknown): boolean {
  return migrateLegacyConfigWithReport(config).applied.length > 0;
}

/**
 * Move `from` to `to` on `record`. An existing `to` wins; the legacy key is
 * dropped either way.
 */
function renameKey(record: ConfigRecord, from: string, to: string): boolean {
  if (!(from in record)) return false;
  if (!(to in record)) record[to] = record[from];
  delete record[from];
  return true;
}

// ============================================================================
// Legacy Unit-Suffixed Keys
// ============================================================================

const RENAMED_KEYS: ReadonlyArray<[string, string]> = [
  ['overload_threshold_v_per_m', 'overload_threshold'],
  ['calibration_offset_v_per_m', 'calibration_offset'],
  ['calibration_offset_drift_v_per_m_per_hour', 'calibration_offset_drift_per_hour'],
];

registerMigration('unit-suffixed-keys', (config) => {
  let changed = false;
  for (const [from, to] of RENAMED_KEYS) {
    if (renameKey(config, from, to)) changed = true;
  }
  return changed;
});

registerMigration('noise-stddev', (config) => {
  const noise = config.noise_characteristics;
  if (!isRecord(noise)) return false;
  return renameKey(noise, 'stddev_v_per_m', 'stddev');
});

registerMigration('baseline-drift', (config) => {
  const drift = config.drift_parameters;
  if (!isRecord(drift)) return false;
  const legacy = drift.baseline_drift_v_per_m_per_hour;
  if (legacy === undefined) return false;

  delete drift.baseline_drift_v_per_m_per_hour;
  if (!('baseline_drift_per_hour' in drift)) {
    drift.baseline_drift_per_hour = isRecord(legacy) ? legacy.ac_field_strength_v_per_m ?? 0 : legacy;
  }
  return true;
});

// ============================================================================
// Legacy Harmonic Names
// ============================================================================

registerMigration('harmonic-names', (config) => {
  const curve = config.frequency_response_curve;
  if (!isRecord(curve)) return false;
  return renameKey(curve, '3th', '3rd');
});

// ============================================================================
// Config Normalization
// ============================================================================

/**
 * Normalize a config for hashing (deterministic JSON)
 */
export function normalizeConfig(config: unknown): string {
  const sortedKeys = (value: unknown): unknown => {
    if (Array.isArray(value)) return value.map(sortedKeys);
    if (!isRecord(value)) return value;
    const sorted: ConfigRecord = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortedKeys(value[key]);
    }
    return sorted;
  };

  return JSON.stringify(sortedKeys(config));
}
