/**
 * Sensor description compiler
 *
 * Compiles sensor calibration YAML into xacro sensor descriptions.
 *
 * @module compiler
 *
 * @example
 * ```typescript
 * import { compileSensors } from '@compiler';
 *
 * compileSensors({
 *   templateDirectory: 'templates',
 *   calibrationDirectory: 'config',
 *   outputDirectory: 'urdf',
 *   projectName: 'my_sensor_kit_description',
 * });
 * ```
 */

// ===== Compiler =====
export {
  compileSensors,
  renderArtifacts,
  planSensors,
  buildAggregateContext,
  buildUnitContext,
  CompileContext,
} from './compiler';
export type { CompileOptions, CompileResult, Artifact, SensorPlan } from './compiler';

// ===== Calibration Model =====
export { Calibration } from './calibration';
export { Transformation, deriveName, deriveFrameId } from './transformation';
export { DeferredLookup } from './lookup';
export { loadCalibrationSource, readSource } from './loader';

// ===== Classification & Macros =====
export { LinkType, LINK_TYPE_RULES, obtainLinkType, determineLinkType, parseLinkType } from './link-type';
export type { SensorLinkType, LinkTypeRule } from './link-type';
export { macroFor, jointUnitInclude, flatMacro, originMacro } from './macros';
export type { SensorMacro } from './macros';

// ===== Templates =====
export { loadTemplate } from './templates';

// ===== Errors =====
export {
  CompilerError,
  NotFoundError,
  ParseError,
  FormatError,
  MissingFieldError,
  DispatchGapError,
  NestedJointUnitError,
} from './errors';

// ===== Config & Logging =====
export { COMPILER_CONFIG, defaultConfigPath } from './config';
export { initLogger, log, warn, getLogBuffer, getMessages, clearLog } from './logger';
export type { LoggerOptions, LogLevel } from './logger';
