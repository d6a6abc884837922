/**
 * Render Context Types
 *
 * Keys consumed by the xacro templates. Names are snake_case because the
 * templates address them directly.
 *
 * @module core/types/render
 */

/**
 * A joint unit referenced from the aggregate description.
 */
export interface SensorUnitEntry {
  base_frame: string;
  child_frame: string;
  macro_name: string;
  name: string;
}

/**
 * Context for `sensors.xacro.template`.
 */
export interface AggregateRenderContext {
  default_config_path: string;
  sensor_calibration_yaml_path: string;
  sensor_units_includes: string[];
  sensor_units: SensorUnitEntry[];
  isolated_sensors_includes: string[];
  isolated_sensors: string[];
}

/**
 * Context for `sensor_unit.xacro.template`.
 */
export interface UnitRenderContext {
  unit_macro_name: string;
  default_config_path: string;
  joint_unit_name: string;
  current_base_link: string;
  isolated_sensors_includes: string[];
  isolated_sensors: string[];
}
