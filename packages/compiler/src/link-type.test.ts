/**
 * Link Type Tests
 *
 * Explicit and name-based classification, including rule precedence.
 *
 * To run:
 *   npx vitest run packages/compiler/src/link-type.test.ts
 *
 * @module compiler/link-type/test
 */

import { beforeAll, beforeEach, describe, expect, it } from 'vitest';

import { LINK_TYPE_RULES, LinkType, determineLinkType, obtainLinkType, parseLinkType } from './link-type';
import { clearLog, getMessages, initLogger } from './logger';

beforeAll(() => initLogger({ quiet: true }));
beforeEach(() => clearLog());

describe('parseLinkType', () => {
  it('matches canonical values ignoring case', () => {
    expect(parseLinkType('Monocular_Camera')).toBe(LinkType.CAMERA);
    expect(parseLinkType('PANDAR_QT128')).toBe(LinkType.PANDAR_QT128);
    expect(parseLinkType('units')).toBe(LinkType.JOINT_UNITS);
  });

  it('returns undefined for unknown types', () => {
    expect(parseLinkType('lidar')).toBeUndefined();
  });
});

describe('determineLinkType', () => {
  it.each([
    ['camera0_base_link', LinkType.CAMERA],
    ['CAM_Front', LinkType.CAMERA],
    ['tamagawa_imu_link', LinkType.IMU],
    ['gnss_link', LinkType.GNSS],
    ['livox_front_left_base_link', LinkType.LIVOX],
    ['velodyne_top_lidar', LinkType.VLS128],
    ['velodyne_lidar', LinkType.VELODYNE16],
    ['front_center_radar_link', LinkType.RADAR],
    ['ars408_front', LinkType.RADAR],
    ['pandar_40p_left', LinkType.PANDAR_40P],
    ['pandar_qt_right', LinkType.PANDAR_QT],
    ['hesai_top', LinkType.PANDAR_OT128],
    ['hesai_front_left', LinkType.PANDAR_XT32],
    ['hesai_rear', LinkType.PANDAR_XT32],
  ])('classifies %s as %s', (name, expected) => {
    expect(determineLinkType(name)).toBe(expected);
    expect(getMessages('WARN')).toEqual([]);
  });

  it('resolves overlapping markers by rule order', () => {
    expect(determineLinkType('camera_imu_link')).toBe(LinkType.CAMERA);
    expect(determineLinkType('velodyne_radar')).toBe(LinkType.VELODYNE16);
  });

  it('assumes a joint unit when nothing matches', () => {
    expect(determineLinkType('sensor_kit')).toBe(LinkType.JOINT_UNITS);
    expect(getMessages('WARN')).toEqual(["Link type not found for 'sensor_kit', suspected to be a joint unit"]);
  });

  it('never produces the joint unit type from a rule', () => {
    expect(LINK_TYPE_RULES.map((rule) => rule.linkType)).not.toContain(LinkType.JOINT_UNITS);
  });
});

describe('obtainLinkType', () => {
  it('prefers the declared type over the name', () => {
    expect(obtainLinkType({ type: 'radar', childFrame: 'front_cam_link' })).toBe(LinkType.RADAR);
  });

  it('falls back to the child frame when the declared type is unknown', () => {
    expect(obtainLinkType({ type: 'thermal', childFrame: 'front_cam_link' })).toBe(LinkType.CAMERA);
  });

  it('uses the child frame when no type is declared', () => {
    expect(obtainLinkType({ type: '', childFrame: 'velodyne_top_lidar' })).toBe(LinkType.VLS128);
    expect(obtainLinkType({ type: '', childFrame: 'velodyne_lidar' })).toBe(LinkType.VELODYNE16);
  });
});
