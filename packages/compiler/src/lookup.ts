import type { OffsetField } from '@core/types';

/**
 * A reference into the calibration table that xacro resolves when the
 * description is loaded:
 *
 *   ${calibration['base_link']['sensor_kit_base_link']['x']}
 *
 * The compiler never sees the number behind it.
 */
export class DeferredLookup {
  constructor(
    readonly baseFrame: string,
    readonly childFrame: string,
    readonly field: OffsetField,
  ) {}

  toString(): string {
    return `\${calibration['${this.baseFrame}']['${this.childFrame}']['${this.field}']}`;
  }
}
