/**
 * Transformation
 *
 * One child frame's offset from its base frame, plus the sensor type and
 * frame id the macro generators need.
 *
 * @module compiler/transformation
 */

import { OFFSET_FIELDS, type OffsetField, type Offsets } from '@core/types';

import { FormatError, MissingFieldError } from './errors';
import { determineLinkType } from './link-type';
import { warn } from './logger';
import { DeferredLookup } from './lookup';
import { asMapping, type Mapping } from './mapping';

/** Suffixes stripped from a child frame to form the sensor name, in order */
const NAME_SUFFIXES = ['_base_link', '_link'] as const;

/**
 * Type substrings whose macros append `_base_link` to the name themselves,
 * so they get the short name as frame id.
 */
const SHORT_FRAME_ID_MARKERS = ['pandar', 'livox', 'camera', 'vls', 'vlp'] as const;

/**
 * Strip the `_base_link` and `_link` suffixes from a child frame.
 *
 * @example
 * deriveName('camera_front_base_link'); // 'camera_front'
 */
export function deriveName(childFrame: string): string {
  return NAME_SUFFIXES.reduce((name, suffix) => name.replaceAll(suffix, ''), childFrame);
}

/**
 * Frame id used when the entry declares none.
 */
export function deriveFrameId(type: string, name: string, childFrame: string): string {
  const lower = type.toLowerCase();
  return SHORT_FRAME_ID_MARKERS.some((marker) => lower.includes(marker)) ? name : childFrame;
}

function readOffset(fields: Mapping, field: OffsetField, childFrame: string, source: string): number {
  if (!fields.has(field)) {
    throw new MissingFieldError(childFrame, field, source);
  }
  const value = fields.get(field);
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new FormatError(source, `field '${field}' of '${childFrame}' must be a number, got ${JSON.stringify(value)}`);
  }
  return value;
}

function readOptionalString(fields: Mapping, field: string, childFrame: string, source: string): string {
  const value = fields.get(field);
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value !== 'string') {
    throw new FormatError(source, `field '${field}' of '${childFrame}' must be a string`);
  }
  return value;
}

export class Transformation implements Offsets {
  readonly x: number;
  readonly y: number;
  readonly z: number;
  readonly roll: number;
  readonly pitch: number;
  readonly yaw: number;

  /** Child frame with well-known suffixes stripped */
  readonly name: string;

  /** Declared type, or the canonical string inferred from `name` */
  readonly type: string;

  readonly frameId: string;

  /**
   * @param entry - The child frame's mapping from the calibration source
   * @param source - Calibration file, for error messages
   */
  constructor(
    entry: unknown,
    readonly baseFrame: string,
    readonly childFrame: string,
    source = '<inline>',
  ) {
    const fields = asMapping(entry);
    if (!fields) {
      throw new FormatError(source, `child frame '${childFrame}' must be a mapping`);
    }

    this.x = readOffset(fields, 'x', childFrame, source);
    this.y = readOffset(fields, 'y', childFrame, source);
    this.z = readOffset(fields, 'z', childFrame, source);
    this.roll = readOffset(fields, 'roll', childFrame, source);
    this.pitch = readOffset(fields, 'pitch', childFrame, source);
    this.yaw = readOffset(fields, 'yaw', childFrame, source);

    this.name = deriveName(childFrame);
    if (this.name.length === 0) {
      throw new FormatError(source, `child frame '${childFrame}' has no name once its link suffixes are removed`);
    }

    const declaredType = readOptionalString(fields, 'type', childFrame, source);
    if (declaredType.length > 0) {
      this.type = declaredType;
    } else {
      this.type = determineLinkType(this.name);
      warn(`Link type not explicitly defined for '${this.name}'. Determined type from link name: ${this.type}`);
    }

    const declaredFrameId = readOptionalString(fields, 'frame_id', childFrame, source);
    this.frameId = declaredFrameId.length > 0 ? declaredFrameId : deriveFrameId(this.type, this.name, childFrame);

    Object.freeze(this);
  }

  /**
   * Deferred lookup of one offset in the runtime calibration table
   */
  lookup(field: OffsetField): DeferredLookup {
    return new DeferredLookup(this.baseFrame, this.childFrame, field);
  }

  /**
   * Lookups for all six offsets, in x, y, z, roll, pitch, yaw order
   */
  lookups(): DeferredLookup[] {
    return OFFSET_FIELDS.map((field) => this.lookup(field));
  }
}
