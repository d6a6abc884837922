/**
 * Calibration Types
 *
 * Shapes of the sensor calibration sources: one base frame mapping
 * child frames to their 6-DOF offsets.
 *
 * @module core/types/calibration
 */

// ===== Offsets =====

/** The six offset components every child frame must declare, in emission order */
export const OFFSET_FIELDS = ['x', 'y', 'z', 'roll', 'pitch', 'yaw'] as const;

export type OffsetField = (typeof OFFSET_FIELDS)[number];

/** Translation in meters, rotation in radians */
export type Offsets = Record<OffsetField, number>;

// ===== Source Entries =====

/**
 * One child-frame entry as written in a calibration file.
 */
export interface FrameEntry extends Offsets {
  /** Sensor type, e.g. `monocular_camera` (inferred from the frame name when absent) */
  type?: string;
  /** Frame id passed to the sensor macro */
  frame_id?: string;
}

/**
 * A calibration source before validation.
 *
 * Loaded files come back as ordered `Map`s so child frames keep their
 * declaration order; plain objects are accepted for programmatic input.
 */
export type RawMapping = ReadonlyMap<unknown, unknown> | Record<string, unknown>;

/**
 * Calibration file content: `{ [baseFrame]: { [childFrame]: FrameEntry } }`
 */
export type CalibrationDocument = Record<string, Record<string, FrameEntry>>;
