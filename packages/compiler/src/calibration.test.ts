/**
 * Calibration Model Tests
 *
 * Builds calibrations from plain objects and from YAML files, and checks
 * the shape rules on base and child frames.
 *
 * To run:
 *   npx vitest run packages/compiler/src/calibration.test.ts
 *
 * @module compiler/calibration/test
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';

import type { CalibrationDocument } from '@core/types';

import { Calibration } from './calibration';
import { FormatError, MissingFieldError } from './errors';
import { initLogger } from './logger';

const OFFSETS = { x: 0.9, y: 0, z: 2.1, roll: -0.01, pitch: 0.02, yaw: 0 };

beforeAll(() => initLogger({ quiet: true }));

describe('Calibration', () => {
  it('builds one transformation per child frame', () => {
    const document: CalibrationDocument = {
      base_link: {
        sensor_kit_base_link: OFFSETS,
        front_center_radar_link: { ...OFFSETS, type: 'radar' },
        gnss_link: OFFSETS,
      },
    };

    const calibration = new Calibration(document);

    expect(calibration.baseFrame).toBe('base_link');
    expect(calibration.size).toBe(3);
    expect([...calibration.transforms.keys()]).toEqual(['sensor_kit_base_link', 'front_center_radar_link', 'gnss_link']);
    expect(calibration.transforms.get('gnss_link')?.baseFrame).toBe('base_link');
  });

  it('accepts a base frame without children', () => {
    expect(new Calibration({ base_link: {} }).size).toBe(0);
  });

  it('rejects a mapping without a base frame', () => {
    expect(() => new Calibration({})).toThrow(FormatError);
  });

  it('rejects more than one base frame', () => {
    expect(() => new Calibration({ base_link: {}, map: {} })).toThrow(
      'calibration should have exactly one base frame, found 2 top-level keys',
    );
  });

  it('rejects a non-string base frame key', () => {
    expect(() => new Calibration(new Map([[1, {}]]))).toThrow(FormatError);
  });

  it('rejects a base frame that does not map to child frames', () => {
    expect(() => new Calibration({ base_link: 5 })).toThrow(FormatError);
    expect(() => new Calibration({ base_link: ['imu_link'] })).toThrow(FormatError);
  });

  it('rejects non-string child frame keys', () => {
    const raw = new Map([['base_link', new Map([[7, OFFSETS]])]]);

    expect(() => new Calibration(raw)).toThrow(FormatError);
  });

  it('propagates missing fields with the child frame and source', () => {
    const { yaw: _yaw, ...withoutYaw } = OFFSETS;

    expect(() => new Calibration({ base_link: { imu_link: withoutYaw } }, 'sensors_calibration.yaml')).toThrow(
      "Missing field 'yaw' for child frame 'imu_link' in sensors_calibration.yaml",
    );
    expect(() => new Calibration({ base_link: { imu_link: withoutYaw } })).toThrow(MissingFieldError);
  });
});

describe('Calibration.fromFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'calibration-model-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('keeps the declaration order of the file', () => {
    const path = join(dir, 'sensor_kit_calibration.yaml');
    writeFileSync(
      path,
      [
        'sensor_kit_base_link:',
        '  velodyne_top_base_link: {x: 0.0, y: 0.0, z: 0.1, roll: 0.0, pitch: 0.0, yaw: 1.57}',
        '  camera0_base_link: {x: 0.2, y: 0.0, z: 0.0, roll: 0.0, pitch: 0.0, yaw: 0.0, type: monocular_camera}',
        '',
      ].join('\n'),
    );

    const calibration = Calibration.fromFile(path);

    expect(calibration.source).toBe(path);
    expect(calibration.baseFrame).toBe('sensor_kit_base_link');
    expect([...calibration.transforms.keys()]).toEqual(['velodyne_top_base_link', 'camera0_base_link']);
    expect(calibration.transforms.get('camera0_base_link')?.type).toBe('monocular_camera');
  });

  it('resolves offsets shared through a merge key', () => {
    const path = join(dir, 'sensors_calibration.yaml');
    writeFileSync(
      path,
      [
        'base_link:',
        '  imu_link: &origin {x: 0.0, y: 0.0, z: 1.5, roll: 0.0, pitch: 0.0, yaw: 0.0}',
        '  gnss_link: {<<: *origin, type: gnss}',
        '',
      ].join('\n'),
    );

    const calibration = Calibration.fromFile(path);

    expect(calibration.size).toBe(2);
    const gnss = calibration.transforms.get('gnss_link');
    expect(gnss?.type).toBe('gnss');
    expect(gnss?.z).toBe(1.5);
    expect(gnss?.yaw).toBe(0);
  });

  it('rejects integer child frame keys from YAML', () => {
    const path = join(dir, 'numeric_calibration.yaml');
    writeFileSync(path, 'base_link:\n  10: {x: 0, y: 0, z: 0, roll: 0, pitch: 0, yaw: 0}\n');

    expect(() => Calibration.fromFile(path)).toThrow(FormatError);
  });
});
