/**
 * Calibration
 *
 * One base frame and the transformations of its child frames, in the
 * order the source declares them.
 *
 * @module compiler/calibration
 */

import type { RawMapping } from '@core/types';

import { FormatError } from './errors';
import { loadCalibrationSource } from './loader';
import { asMapping } from './mapping';
import { Transformation } from './transformation';

export class Calibration {
  readonly baseFrame: string;
  readonly transforms: ReadonlyMap<string, Transformation>;

  /**
   * @param raw - `{ [baseFrame]: { [childFrame]: entry } }`
   * @param source - Where the mapping came from, for error messages
   */
  constructor(raw: RawMapping, readonly source = '<inline>') {
    const root = asMapping(raw);
    if (!root) {
      throw new FormatError(source, 'calibration must be a mapping');
    }
    if (root.size !== 1) {
      throw new FormatError(source, `calibration should have exactly one base frame, found ${root.size} top-level keys`);
    }

    const [baseFrame, frames] = Array.from(root)[0];
    if (typeof baseFrame !== 'string') {
      throw new FormatError(source, `base frame key must be a string, got ${JSON.stringify(baseFrame)}`);
    }
    const children = asMapping(frames);
    if (!children) {
      throw new FormatError(source, `base frame '${baseFrame}' must map to a mapping of child frames`);
    }

    const transforms = new Map<string, Transformation>();
    for (const [childFrame, entry] of children) {
      if (typeof childFrame !== 'string') {
        throw new FormatError(source, `child frames of '${baseFrame}' must be strings, got ${JSON.stringify(childFrame)}`);
      }
      transforms.set(childFrame, new Transformation(entry, baseFrame, childFrame, source));
    }

    this.baseFrame = baseFrame;
    this.transforms = transforms;
  }

  /**
   * Load and parse a calibration YAML file
   */
  static fromFile(path: string): Calibration {
    return new Calibration(loadCalibrationSource(path), path);
  }

  get size(): number {
    return this.transforms.size;
  }
}
