#!/usr/bin/env npx tsx
/**
 * Sensor Description Compile Script
 *
 * Compiles the sensor calibration of a sensor kit into xacro descriptions:
 * - sensors.xacro from <calibration_dir>/sensors_calibration.yaml
 * - <unit>.xacro for each joint unit, from <unit>_calibration.yaml
 *
 * Usage:
 *   npx tsx scripts/compile-urdf.ts <template_dir> <calibration_dir> <output_dir> <project_name>
 *
 * Environment (.env.local is loaded when present):
 *   URDF_COMPILER_QUIET=1   suppress progress output
 */

import { config as dotenvConfig } from 'dotenv';

import { compileSensors, initLogger } from '@compiler';

dotenvConfig({ path: '.env.local' });

const USAGE = 'Usage: compile-urdf <template_dir> <calibration_dir> <output_dir> <project_name>';

function main(): void {
    const args = process.argv.slice(2);

    if (args.length !== 4) {
        console.error(USAGE);
        process.exit(2);
    }

    initLogger({ quiet: process.env.URDF_COMPILER_QUIET === '1' });

    const [templateDirectory, calibrationDirectory, outputDirectory, projectName] = args;
    const result = compileSensors({ templateDirectory, calibrationDirectory, outputDirectory, projectName });

    console.log(`\n📦 Compiled ${result.isolatedSensorCount} sensor(s) and ${result.jointUnits.length} joint unit(s)`);
    for (const artifact of result.artifacts) {
        console.log(`   ✓ ${artifact.path}`);
    }
}

try {
    main();
} catch (e) {
    console.error('Compile failed:', e instanceof Error ? e.message : e);
    process.exit(1);
}
