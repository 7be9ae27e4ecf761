export { Vector2 } from './physics/vector2';
export { solveKepler, solveKeplerDetailed, keplerResidual } from './physics/kepler';
export { OrbitState, wrapAngle } from './physics/orbit-state';
export { computeTransfer } from './physics/maneuver';
export { sampleOrbit, boundsOf } from './physics/trajectory';
export type { Bounds } from './physics/trajectory';
export { renderOrbitSvg } from './scene/orbit-svg';
export type { OrbitSvgOptions } from './scene/orbit-svg';
export {
  DEFAULT_INPUT,
  readNumber,
  parseMissionInput,
  validateMissionInput,
  validateMissionPlan,
  serializeMissionPlan,
} from './scripting/mission-schema';
export type { RawInput } from './scripting/mission-schema';
export { buildTransferPreset, getPreset, PRESET_IDS, DEFAULT_PRESET } from './scripting/presets';
export { buildTimeline, formatTimeline } from './ui/timeline';
export { telemetrySnapshot, formatOrbitSummary, formatTelemetry } from './ui/hud';
export { buildMissionReport, formatTransfer } from './ui/report';
export type { ReportContext } from './ui/report';
export { MissionPlanner } from './app';
export type { MissionOutput } from './app';
export { loadConfig } from './config';
export type { Config } from './config';
export * from './constants';
export type * from './types';
