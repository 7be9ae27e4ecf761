import { config as defaultConfig } from './config';
import type { Config } from './config';
import { SECONDS_PER_HOUR } from './constants';
import { computeTransfer } from './physics/maneuver';
import { OrbitState } from './physics/orbit-state';
import { renderOrbitSvg } from './scene/orbit-svg';
import { validateMissionInput } from './scripting/mission-schema';
import type { MissionEvent, MissionInput, MissionPlan, Telemetry, TransferResult } from './types';
import { formatOrbitSummary, telemetrySnapshot } from './ui/hud';
import { buildMissionReport } from './ui/report';
import { buildTimeline } from './ui/timeline';

export interface MissionOutput {
  name: string;
  input: MissionInput;
  errors: string[];
  orbit: OrbitState;
  transfer: TransferResult;
  summary: string | null;
  timeline: MissionEvent[] | null;
  telemetry: Telemetry | null;
  svg: string | null;
  report: string | null;
}

/**
 * Turns one set of mission inputs into everything the planner shows:
 * orbit summary, transfer, timeline, telemetry, SVG and report.
 *
 * The transfer is always computed from the (clamped) inputs; the rest
 * requires inputs that pass validateMissionInput.
 */
export class MissionPlanner {
  constructor(private readonly cfg: Config = defaultConfig) {}

  buildOrbit(input: MissionInput): OrbitState {
    return new OrbitState(
      { mu: this.cfg.mu, a: input.a, e: input.e, i: input.i, raan: input.raan, argp: input.argp },
      this.cfg.kepler
    );
  }

  plan(plan: MissionPlan, now: Date = new Date()): MissionOutput {
    const { input } = plan;
    const orbit = this.buildOrbit(input);
    const transfer = computeTransfer(this.cfg.mu, input.a, input.targetRadius);
    const errors = validateMissionInput(input);

    if (errors.length > 0) {
      return {
        name: plan.name,
        input,
        errors,
        orbit,
        transfer,
        summary: null,
        timeline: null,
        telemetry: null,
        svg: null,
        report: null,
      };
    }

    const telemetry = telemetrySnapshot(orbit, input.timeOffset);
    if (!telemetry.converged) {
      console.warn(`Kepler solver did not converge for e=${input.e}; telemetry is a best estimate`);
    }

    const launchTime = new Date(now.getTime() + this.cfg.launchDelayHours * SECONDS_PER_HOUR * 1000);

    return {
      name: plan.name,
      input,
      errors,
      orbit,
      transfer,
      summary: formatOrbitSummary(orbit),
      timeline: buildTimeline(transfer, launchTime),
      telemetry,
      svg: renderOrbitSvg(orbit, {
        size: this.cfg.svg.size,
        margin: this.cfg.svg.margin,
        points: this.cfg.svg.points,
        timeOffset: input.timeOffset,
      }),
      report: buildMissionReport({
        missionName: plan.name,
        orbit,
        targetRadius: input.targetRadius,
        transfer,
      }),
    };
  }
}
