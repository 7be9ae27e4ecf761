import { SECONDS_PER_HOUR } from '../constants';
import type { OrbitState } from '../physics/orbit-state';
import type { TransferResult } from '../types';
import { formatNumber } from './format';

export interface ReportContext {
  missionName: string;
  orbit: OrbitState;
  targetRadius: number;
  transfer: TransferResult;
}

/** Plain-text mission report, one fact per line. */
export function buildMissionReport(ctx: ReportContext): string {
  const { orbit, transfer } = ctx;
  const lines = [
    'MISSION REPORT',
    `Mission: ${ctx.missionName}`,
    `Semi-major axis (a): ${formatNumber(orbit.a, 2)} km`,
    `Eccentricity: ${formatNumber(orbit.e, 6)}`,
    `Orbital period: ${formatNumber(orbit.period() / SECONDS_PER_HOUR, 6)} hours`,
    `Hohmann transfer to r=${formatNumber(ctx.targetRadius, 2)} km -> `
      + `Δv_total=${formatNumber(transfer.dvTotal, 6)} km/s, `
      + `TOF=${formatNumber(transfer.timeOfFlight / SECONDS_PER_HOUR, 6)} hours`,
  ];
  return lines.join('\n') + '\n';
}

/** Transfer breakdown for the planner's transfer panel. */
export function formatTransfer(targetRadius: number, transfer: TransferResult): string {
  return (
`TARGET ${formatNumber(targetRadius, 2)} km
DV1    ${formatNumber(transfer.dv1, 5)} km/s
DV2    ${formatNumber(transfer.dv2, 5)} km/s
DVTOT  ${formatNumber(transfer.dvTotal, 5)} km/s
TOF    ${formatNumber(transfer.timeOfFlight / SECONDS_PER_HOUR, 5)} hours`);
}
