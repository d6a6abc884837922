/**
 * Sensor Macros
 *
 * For each sensor category: the xacro file that defines its macro and a
 * generator that writes the macro invocation for one transformation.
 *
 * Most macros take flat attributes. The Velodyne macros take an `<origin>`
 * child element instead.
 *
 * @module compiler/macros
 */

import {
  CAMERA_MACRO_DEFAULTS,
  IMU_MACRO_DEFAULTS,
  VELODYNE_MACRO_DEFAULTS,
  formatAttributes,
  type MacroAttributes,
} from '@core/sensor/config';
import { OFFSET_FIELDS } from '@core/types';

import { DispatchGapError } from './errors';
import { LinkType } from './link-type';
import type { Transformation } from './transformation';

export interface SensorMacro {
  /** Locator of the xacro file defining the macro */
  readonly include: string;
  /** Macro invocation for one transformation */
  readonly render: (transform: Transformation) => string;
}

const ATTRIBUTE_INDENT = '        ';

/**
 * `<xacro:MACRO name=... parent=... x=... ... />`
 */
export function flatMacro(macroName: string, transform: Transformation, extra: MacroAttributes = {}): string {
  const attributes = [
    `name="${transform.frameId}"`,
    `parent="${transform.baseFrame}"`,
    ...OFFSET_FIELDS.map((field) => `${field}="${transform.lookup(field)}"`),
    ...formatAttributes(extra),
  ];
  return `<xacro:${macroName}\n${attributes.map((a) => ATTRIBUTE_INDENT + a).join('\n')}\n    />`;
}

/**
 * `<xacro:MACRO parent=... name=... ...><origin xyz=... rpy=.../></xacro:MACRO>`
 */
export function originMacro(macroName: string, transform: Transformation): string {
  const [x, y, z, roll, pitch, yaw] = transform.lookups();
  const attributes = formatAttributes({
    parent: transform.baseFrame,
    name: transform.frameId,
    ...VELODYNE_MACRO_DEFAULTS,
  });
  return [
    `<xacro:${macroName} ${attributes.join(' ')}>`,
    `      <origin xyz="${x} ${y} ${z}" rpy="${roll} ${pitch} ${yaw}"/>`,
    `    </xacro:${macroName}>`,
  ].join('\n');
}

function flat(include: string, macroName: string, extra?: MacroAttributes): SensorMacro {
  return { include, render: (transform) => flatMacro(macroName, transform, extra) };
}

const CAMERA = flat('$(find camera_description)/urdf/monocular_camera.xacro', 'monocular_camera_macro', CAMERA_MACRO_DEFAULTS);
// GNSS receivers reuse the IMU description for now
const IMU = flat('$(find imu_description)/urdf/imu.xacro', 'imu_macro', IMU_MACRO_DEFAULTS);
const LIVOX = flat('$(find livox_description)/urdf/livox_horizon.xacro', 'livox_horizon_macro');
const RADAR = flat('$(find radar_description)/urdf/radar.xacro', 'radar_macro');
const PANDAR_40P = flat('$(find pandar_description)/urdf/pandar_40p.xacro', 'Pandar40P');
const PANDAR_OT128 = flat('$(find pandar_description)/urdf/pandar_ot128.xacro', 'PandarOT-128');
const PANDAR_XT32 = flat('$(find pandar_description)/urdf/pandar_xt32.xacro', 'PandarXT-32');
const PANDAR_QT = flat('$(find pandar_description)/urdf/pandar_qt.xacro', 'PandarQT');
const PANDAR_QT128 = flat('$(find pandar_description)/urdf/pandar_qt128.xacro', 'PandarQT-128');

const VELODYNE16: SensorMacro = {
  include: '$(find velodyne_description)/urdf/VLP-16.urdf.xacro',
  render: (transform) => originMacro('VLP-16', transform),
};

const VLS128: SensorMacro = {
  include: '$(find vls_description)/urdf/VLS-128.urdf.xacro',
  render: (transform) => originMacro('VLS-128', transform),
};

function unreachable(linkType: never): never {
  throw new DispatchGapError(String(linkType));
}

/**
 * Macro for a sensor category.
 *
 * Joint units have no macro of their own; asking for one is a
 * DispatchGapError.
 */
export function macroFor(linkType: LinkType): SensorMacro {
  switch (linkType) {
    case LinkType.CAMERA:
      return CAMERA;
    case LinkType.IMU:
    case LinkType.GNSS:
      return IMU;
    case LinkType.LIVOX:
      return LIVOX;
    case LinkType.RADAR:
      return RADAR;
    case LinkType.PANDAR_40P:
      return PANDAR_40P;
    case LinkType.PANDAR_OT128:
      return PANDAR_OT128;
    case LinkType.PANDAR_XT32:
      return PANDAR_XT32;
    case LinkType.PANDAR_QT:
      return PANDAR_QT;
    case LinkType.PANDAR_QT128:
      return PANDAR_QT128;
    case LinkType.VELODYNE16:
      return VELODYNE16;
    case LinkType.VLS128:
      return VLS128;
    case LinkType.JOINT_UNITS:
      throw new DispatchGapError(linkType);
    default:
      return unreachable(linkType);
  }
}

/**
 * Include of a joint unit's generated description, `<name>.xacro`
 */
export function jointUnitInclude(unitName: string): string {
  return `${unitName}.xacro`;
}
