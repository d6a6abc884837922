/**
 * Compiler configuration
 * File names and path conventions shared by the compiler and the CLI
 */

export const COMPILER_CONFIG = {
  /** Main calibration file in the calibration directory */
  MAIN_CALIBRATION: 'sensors_calibration.yaml',

  /** Joint unit calibration files are `<unit>_calibration.yaml` */
  UNIT_CALIBRATION_SUFFIX: '_calibration.yaml',

  AGGREGATE_TEMPLATE: 'sensors.xacro.template',
  UNIT_TEMPLATE: 'sensor_unit.xacro.template',

  AGGREGATE_OUTPUT: 'sensors.xacro',
  OUTPUT_EXTENSION: '.xacro',

  /** Resolved by xacro at load time, relative to the `config_dir` argument */
  SENSOR_CALIBRATION_YAML_PATH: '$(arg config_dir)/sensors_calibration.yaml',
} as const;

/**
 * `$(find <project>)/config`
 */
export function defaultConfigPath(projectName: string): string {
  return `$(find ${projectName})/config`;
}

export function unitCalibrationFile(unitName: string): string {
  return `${unitName}${COMPILER_CONFIG.UNIT_CALIBRATION_SUFFIX}`;
}

export function unitOutputFile(unitName: string): string {
  return `${unitName}${COMPILER_CONFIG.OUTPUT_EXTENSION}`;
}

export function unitMacroName(unitName: string): string {
  return `${unitName}_macro`;
}
