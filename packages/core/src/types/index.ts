/**
 * Core Types for the sensor description compiler
 *
 * Re-exports all types from submodules for convenient importing:
 *
 *   import { OFFSET_FIELDS, type SensorUnitEntry } from '@core/types';
 *
 * Type Modules:
 * - calibration: offsets, frame entries, raw calibration sources
 * - render: template render contexts
 *
 * @module core/types
 */

// Calibration sources
export * from './calibration';

// Template contexts
export * from './render';
