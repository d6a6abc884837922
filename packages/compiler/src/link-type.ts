/**
 * Link Type Classification
 *
 * Resolves a transformation to one of the known sensor categories.
 * A declared type wins; otherwise the child frame name is matched against
 * LINK_TYPE_RULES in order.
 *
 * @module compiler/link-type
 */

import { warn } from './logger';
import type { Transformation } from './transformation';

export enum LinkType {
  CAMERA = 'monocular_camera',
  IMU = 'imu',
  LIVOX = 'livox_horizon',
  PANDAR_40P = 'pandar_40p',
  PANDAR_OT128 = 'pandar_ot128',
  PANDAR_XT32 = 'pandar_xt32',
  PANDAR_QT = 'pandar_qt',
  PANDAR_QT128 = 'pandar_qt128',
  VELODYNE16 = 'velodyne_16',
  VLS128 = 'velodyne_128',
  RADAR = 'radar',
  GNSS = 'gnss',
  /** Not a sensor: a mounting group expanded from its own calibration file */
  JOINT_UNITS = 'units',
}

/** Every category with a macro of its own */
export type SensorLinkType = Exclude<LinkType, LinkType.JOINT_UNITS>;

export interface LinkTypeRule {
  /** Receives the lower-cased frame name */
  readonly matches: (name: string) => boolean;
  readonly linkType: SensorLinkType;
}

const contains =
  (...markers: string[]) =>
  (name: string): boolean =>
    markers.some((marker) => name.includes(marker));

/**
 * Name heuristics, first match wins. Order matters where markers overlap:
 * `velodyne` + `top` before plain `velodyne`, `hesai_top` and `hesai_front`
 * before plain `hesai`.
 */
export const LINK_TYPE_RULES: readonly LinkTypeRule[] = [
  { matches: contains('cam'), linkType: LinkType.CAMERA },
  { matches: contains('imu'), linkType: LinkType.IMU },
  { matches: contains('gnss'), linkType: LinkType.GNSS },
  { matches: contains('livox'), linkType: LinkType.LIVOX },
  { matches: (name) => name.includes('velodyne') && name.includes('top'), linkType: LinkType.VLS128 },
  { matches: contains('velodyne'), linkType: LinkType.VELODYNE16 },
  { matches: contains('radar', 'ars'), linkType: LinkType.RADAR },
  { matches: contains('pandar_40p'), linkType: LinkType.PANDAR_40P },
  { matches: contains('pandar_qt'), linkType: LinkType.PANDAR_QT },
  { matches: contains('hesai_top'), linkType: LinkType.PANDAR_OT128 },
  { matches: contains('hesai_front'), linkType: LinkType.PANDAR_XT32 },
  { matches: contains('hesai'), linkType: LinkType.PANDAR_XT32 },
];

const LINK_TYPES: readonly LinkType[] = Object.values(LinkType);

/**
 * Match a declared type string against the canonical values, ignoring case
 */
export function parseLinkType(value: string): LinkType | undefined {
  const lower = value.toLowerCase();
  return LINK_TYPES.find((linkType) => linkType === lower);
}

/**
 * Guess the link type from a frame name.
 * Names matching no rule are assumed to be joint units.
 */
export function determineLinkType(linkName: string): LinkType {
  const lower = linkName.toLowerCase();
  const rule = LINK_TYPE_RULES.find((candidate) => candidate.matches(lower));
  if (rule) {
    return rule.linkType;
  }
  warn(`Link type not found for '${linkName}', suspected to be a joint unit`);
  return LinkType.JOINT_UNITS;
}

/**
 * Link type of a transformation: its declared type when that names a known
 * category, the child frame heuristics otherwise.
 */
export function obtainLinkType(link: Pick<Transformation, 'type' | 'childFrame'>): LinkType {
  if (link.type.length > 0) {
    const declared = parseLinkType(link.type);
    if (declared) {
      return declared;
    }
  }
  return determineLinkType(link.childFrame);
}
