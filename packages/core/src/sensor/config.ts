/**
 * Sensor Macro Defaults
 *
 * Fixed attribute values passed to the sensor description macros.
 * Per-sensor tuning happens in the description packages, not here.
 */

/**
 * Monocular camera defaults
 * Resolution in pixels, field of view in radians
 */
export const CAMERA_MACRO_DEFAULTS = {
  fps: 30,
  width: 800,
  height: 400,
  namespace: '',
  fov: 1.3,
} as const;

/**
 * IMU defaults (also used for GNSS receivers)
 */
export const IMU_MACRO_DEFAULTS = {
  fps: 100,
  namespace: '',
} as const;

/**
 * Velodyne simulation defaults for the VLP-16 / VLS-128 macros
 */
export const VELODYNE_MACRO_DEFAULTS = {
  topic: '/points_raw',
  hz: 10,
  samples: 220,
  gpu: '$(arg gpu)',
} as const;

export type MacroAttributes = Readonly<Record<string, string | number>>;

/**
 * Format attributes as `key="value"` pairs in declaration order
 */
export function formatAttributes(attributes: MacroAttributes): string[] {
  return Object.entries(attributes).map(([key, value]) => `${key}="${value}"`);
}
