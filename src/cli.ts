/**
 * Command-line front end for the mission planner
 *
 * Usage: mission-planner [options]
 *
 * Examples:
 *   mission-planner --a 7000 --e 0.01 --target 42164
 *   mission-planner --preset leo-meo --svg orbit.svg
 *   mission-planner --plan mission.json --t 1800
 */
import * as fs from 'node:fs';
import { MissionPlanner } from './app';
import type { MissionOutput } from './app';
import { parseMissionInput, serializeMissionPlan, validateMissionPlan } from './scripting/mission-schema';
import { DEFAULT_PRESET, PRESET_IDS, getPreset } from './scripting/presets';
import type { MissionPlan } from './types';
import { formatDuration } from './ui/format';
import { formatTelemetry } from './ui/hud';
import { formatTransfer } from './ui/report';
import { formatTimeline } from './ui/timeline';

export interface CliOptions {
  /** Orbit and target overrides, as typed */
  values: Record<string, string>;
  preset?: string;
  plan?: string;
  export?: string;
  svg?: string;
  listPresets: boolean;
  help: boolean;
}

const INPUT_OPTIONS = new Set(['a', 'e', 'i', 'raan', 'argp', 'target', 'target-radius', 't']);
const FILE_OPTIONS = new Set(['preset', 'plan', 'export', 'svg']);

export class CliError extends Error {}

/**
 * Parse CLI arguments: --key=value, --key value, or --flag.
 */
export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = { values: {}, listPresets: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '-h' || arg === '--help') {
      options.help = true;
      continue;
    }
    if (arg === '--list-presets') {
      options.listPresets = true;
      continue;
    }
    if (!arg.startsWith('--')) {
      throw new CliError(`Unexpected argument: ${arg}`);
    }

    let key: string;
    let value: string | undefined;
    const eqIndex = arg.indexOf('=');
    if (eqIndex !== -1) {
      key = arg.slice(2, eqIndex);
      value = arg.slice(eqIndex + 1);
    } else {
      key = arg.slice(2);
      // Only "--" starts an option, so negative numbers pass as values
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        value = next;
        i++;
      }
    }
    if (value === undefined) {
      throw new CliError(`Missing value for --${key}`);
    }

    if (INPUT_OPTIONS.has(key)) {
      options.values[key === 'target-radius' ? 'target_radius' : key] = value;
    } else if (FILE_OPTIONS.has(key)) {
      if (key === 'preset') options.preset = value;
      else if (key === 'plan') options.plan = value;
      else if (key === 'export') options.export = value;
      else options.svg = value;
    } else {
      throw new CliError(`Unknown option: --${key}`);
    }
  }

  return options;
}

function printHelp(): void {
  console.log(`
mission-planner - planar orbit and Hohmann transfer planner

Usage: mission-planner [options]

Orbit:
  --a <km>              Semi-major axis (default 6771, min 1600)
  --e <value>           Eccentricity, 0 <= e < 1 (default 0.001)
  --i <deg>             Inclination, reporting only (default 28.5)
  --raan <deg>          Right ascension of ascending node, reporting only
  --argp <deg>          Argument of perigee, reporting only
  --t <s>               Time since periapsis for spacecraft position

Transfer:
  --target <km>         Target circular orbit radius (default 42164)

Plans:
  --preset <id>         Start from a preset (${PRESET_IDS.join(', ')})
  --plan <file>         Start from a mission plan JSON file
  --export <file>       Write the resulting mission plan as JSON
  --svg <file>          Write the orbit visualization as SVG
  --list-presets        List available presets
`);
}

function loadPlan(path: string): MissionPlan {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(path, 'utf8'));
  } catch (error) {
    throw new CliError(`Failed to read mission plan ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  const plan = validateMissionPlan(data);
  if (!plan) {
    throw new CliError(`Invalid mission plan JSON: ${path}`);
  }
  return plan;
}

function resolvePlan(options: CliOptions): MissionPlan {
  let base: MissionPlan;
  if (options.plan !== undefined) {
    base = loadPlan(options.plan);
  } else {
    const presetId = options.preset ?? DEFAULT_PRESET;
    const preset = getPreset(presetId);
    if (!preset) {
      throw new CliError(`Unknown preset: ${presetId}`);
    }
    base = preset;
  }
  return { ...base, input: parseMissionInput(options.values, base.input) };
}

function printOutput(output: MissionOutput): void {
  console.log(`=== ${output.name} ===\n`);
  if (output.summary) console.log(`${output.summary}\n`);
  console.log('Transfer (Hohmann, coplanar):');
  console.log(`${formatTransfer(output.input.targetRadius, output.transfer)}\n`);
  if (output.telemetry) console.log(`Telemetry at T+${formatDuration(output.input.timeOffset)}:\n${formatTelemetry(output.telemetry)}\n`);
  if (output.timeline) console.log(`Mission timeline (UTC):\n${formatTimeline(output.timeline)}\n`);
  if (output.report) console.log(output.report);
}

/**
 * Run the CLI.
 * @returns Process exit code
 */
export function runCli(args: string[], planner = new MissionPlanner(), now = new Date()): number {
  try {
    const options = parseCliArgs(args);
    if (options.help) {
      printHelp();
      return 0;
    }
    if (options.listPresets) {
      for (const id of PRESET_IDS) {
        console.log(`${id.padEnd(12)} ${getPreset(id)?.name ?? ''}`);
      }
      return 0;
    }

    const plan = resolvePlan(options);
    const output = planner.plan(plan, now);

    if (output.errors.length > 0) {
      console.error('Input errors:');
      for (const err of output.errors) console.error(`  - ${err}`);
      return 1;
    }

    printOutput(output);

    if (options.svg !== undefined && output.svg !== null) {
      fs.writeFileSync(options.svg, output.svg);
      console.log(`SVG written to ${options.svg}`);
    }
    if (options.export !== undefined) {
      fs.writeFileSync(options.export, serializeMissionPlan(plan));
      console.log(`Mission plan written to ${options.export}`);
    }
    return 0;
  } catch (error) {
    if (error instanceof CliError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
