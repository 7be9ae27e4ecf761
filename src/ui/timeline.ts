import { SECONDS_PER_HOUR } from '../constants';
import type { MissionEvent, TransferResult } from '../types';
import { formatNumber, formatTimestamp } from './format';

const addSeconds = (date: Date, seconds: number) => new Date(date.getTime() + seconds * 1000);

/**
 * Mission events for a two-burn transfer starting at launchTime.
 * Event offsets other than the transfer itself are nominal.
 */
export function buildTimeline(transfer: TransferResult, launchTime: Date): MissionEvent[] {
  const arrival = addSeconds(launchTime, 2 * SECONDS_PER_HOUR + Math.floor(transfer.timeOfFlight));

  return [
    {
      time: launchTime,
      title: 'Launch (T+0)',
      description: 'Ground launch to parking orbit',
    },
    {
      time: addSeconds(launchTime, 0.5 * SECONDS_PER_HOUR),
      title: 'Parking orbit insertion',
      description: 'Circularize to parking orbit',
    },
    {
      time: addSeconds(launchTime, 2 * SECONDS_PER_HOUR),
      title: 'Transfer burn (Δv1)',
      description: `First burn to enter transfer ellipse, Δv ≈ ${formatNumber(transfer.dv1, 5)} km/s`,
    },
    {
      time: arrival,
      title: 'Apogee arrival / Circularize (Δv2)',
      description: `Second burn to circularize, Δv ≈ ${formatNumber(transfer.dv2, 5)} km/s`,
    },
    {
      time: addSeconds(arrival, SECONDS_PER_HOUR),
      title: 'Mission ops begin',
      description: 'Begin mission operations and telemetry',
    },
  ];
}

export function formatTimeline(events: readonly MissionEvent[]): string {
  return events
    .map((ev) => `${formatTimestamp(ev.time)}  ${ev.title}\n                  ${ev.description}`)
    .join('\n');
}
