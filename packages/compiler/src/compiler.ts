/**
 * Sensor Description Compiler
 *
 * Turns `sensors_calibration.yaml` into `sensors.xacro`, and each joint
 * unit's `<unit>_calibration.yaml` into `<unit>.xacro`:
 *
 *   load main calibration
 *   -> classify and partition (isolated sensors / joint units)
 *   -> render aggregate
 *   -> for each joint unit: load, classify, render
 *   -> write all artifacts
 *
 * Nothing is written until every artifact has rendered, so a failing
 * unit leaves the output directory untouched.
 *
 * @module compiler/compiler
 */

import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';

import type { AggregateRenderContext, SensorUnitEntry, UnitRenderContext } from '@core/types';

import { Calibration } from './calibration';
import {
  COMPILER_CONFIG,
  defaultConfigPath,
  unitCalibrationFile,
  unitMacroName,
  unitOutputFile,
} from './config';
import { NestedJointUnitError } from './errors';
import { LinkType, obtainLinkType } from './link-type';
import { log } from './logger';
import { jointUnitInclude, macroFor } from './macros';
import { loadTemplate, type Template } from './templates';

// ===== Types =====

export interface CompileOptions {
  /** Holds sensors.xacro.template and sensor_unit.xacro.template */
  templateDirectory: string;
  /** Holds sensors_calibration.yaml and the joint unit calibrations */
  calibrationDirectory: string;
  /** Created if missing */
  outputDirectory: string;
  /** Package whose config directory holds the calibration files at runtime */
  projectName: string;
}

export interface Artifact {
  path: string;
  content: string;
}

export interface CompileResult {
  artifacts: Artifact[];
  isolatedSensorCount: number;
  jointUnits: string[];
}

/**
 * Classification result for one calibration.
 */
export interface SensorPlan {
  /** Sorted, without duplicates */
  includes: string[];
  /** Macro invocations in declaration order */
  sensors: string[];
  units: SensorUnitEntry[];
  unitIncludes: string[];
}

/**
 * Accumulates one calibration pass. The include set is handed in so that
 * one compile can share it across the aggregate and every unit pass.
 */
export class CompileContext {
  private readonly sensors: string[] = [];
  private readonly units: SensorUnitEntry[] = [];
  private readonly unitIncludes: string[] = [];

  constructor(private readonly includes: Set<string> = new Set()) {}

  addSensor(include: string, invocation: string): void {
    this.includes.add(include);
    this.sensors.push(invocation);
  }

  addUnit(unit: SensorUnitEntry): void {
    this.units.push(unit);
    this.unitIncludes.push(jointUnitInclude(unit.name));
  }

  toPlan(): SensorPlan {
    return {
      includes: [...this.includes].sort(),
      sensors: [...this.sensors],
      units: [...this.units],
      unitIncludes: [...this.unitIncludes],
    };
  }
}

// ===== Classification =====

/**
 * Classify every transformation of a calibration. Sensors get their macro
 * invocation; joint units are collected for a later pass.
 *
 * @param jointUnit - Name of the unit being expanded. Inside a unit another
 *   joint unit is a NestedJointUnitError.
 * @param includes - Includes collected by earlier passes; extended in place
 */
export function planSensors(
  calibration: Calibration,
  jointUnit?: string,
  includes: Set<string> = new Set(),
): SensorPlan {
  const context = new CompileContext(includes);

  for (const transform of calibration.transforms.values()) {
    const linkType = obtainLinkType(transform);

    if (linkType === LinkType.JOINT_UNITS) {
      if (jointUnit !== undefined) {
        throw new NestedJointUnitError(jointUnit, transform.childFrame);
      }
      log(`Collected joint sensor unit ${transform.name}, which will be further rendered.`);
      context.addUnit({
        base_frame: transform.baseFrame,
        child_frame: transform.childFrame,
        macro_name: unitMacroName(transform.name),
        name: transform.name,
      });
    } else {
      log(`Collected ${transform.name}.`);
      const macro = macroFor(linkType);
      context.addSensor(macro.include, macro.render(transform));
    }
  }

  return context.toPlan();
}

// ===== Render Contexts =====

export function buildAggregateContext(plan: SensorPlan, projectName: string): AggregateRenderContext {
  return {
    default_config_path: defaultConfigPath(projectName),
    sensor_calibration_yaml_path: COMPILER_CONFIG.SENSOR_CALIBRATION_YAML_PATH,
    sensor_units_includes: plan.unitIncludes,
    sensor_units: plan.units,
    isolated_sensors_includes: plan.includes,
    isolated_sensors: plan.sensors,
  };
}

export function buildUnitContext(
  unit: SensorUnitEntry,
  calibration: Calibration,
  plan: SensorPlan,
  projectName: string,
): UnitRenderContext {
  return {
    unit_macro_name: unit.macro_name,
    default_config_path: defaultConfigPath(projectName),
    joint_unit_name: unit.name,
    current_base_link: calibration.baseFrame,
    isolated_sensors_includes: plan.includes,
    isolated_sensors: plan.sensors,
  };
}

// ===== Compilation =====

/**
 * Render every artifact in memory without touching the output directory.
 */
export function renderArtifacts(options: CompileOptions): CompileResult {
  const { templateDirectory, calibrationDirectory, outputDirectory, projectName } = options;

  log(`Processing the main ${COMPILER_CONFIG.MAIN_CALIBRATION}`);
  const aggregateTemplate = loadTemplate(join(templateDirectory, COMPILER_CONFIG.AGGREGATE_TEMPLATE));
  const calibration = Calibration.fromFile(join(calibrationDirectory, COMPILER_CONFIG.MAIN_CALIBRATION));
  // Unit files include every macro collected so far, the aggregate's too
  const includes = new Set<string>();
  const plan = planSensors(calibration, undefined, includes);

  const artifacts: Artifact[] = [
    {
      path: join(outputDirectory, COMPILER_CONFIG.AGGREGATE_OUTPUT),
      content: aggregateTemplate.render(buildAggregateContext(plan, projectName)),
    },
  ];

  let unitTemplate: Template | undefined;
  for (const unit of plan.units) {
    log(`Processing ${unit.name}`);
    unitTemplate ??= loadTemplate(join(templateDirectory, COMPILER_CONFIG.UNIT_TEMPLATE));

    const unitCalibration = Calibration.fromFile(join(calibrationDirectory, unitCalibrationFile(unit.name)));
    const unitPlan = planSensors(unitCalibration, unit.name, includes);
    artifacts.push({
      path: join(outputDirectory, unitOutputFile(unit.name)),
      content: unitTemplate.render(buildUnitContext(unit, unitCalibration, unitPlan, projectName)),
    });
  }

  return {
    artifacts,
    isolatedSensorCount: plan.sensors.length,
    jointUnits: plan.units.map((unit) => unit.name),
  };
}

/**
 * Compile the sensor descriptions and write them to the output directory.
 */
export function compileSensors(options: CompileOptions): CompileResult {
  const result = renderArtifacts(options);

  mkdirSync(options.outputDirectory, { recursive: true });
  for (const artifact of result.artifacts) {
    writeFileSync(artifact.path, artifact.content);
    log(`Wrote ${artifact.path}`);
  }

  return result;
}
