import type { TransferResult } from '../types';

/**
 * Calculate Hohmann transfer parameters between two coplanar circular orbits.
 * Works for both orbit raising (r1 < r2) and lowering (r1 > r2); burn
 * magnitudes are always non-negative.
 * @param mu Gravitational parameter (km^3/s^2)
 * @param r1 Radius of departure orbit (km)
 * @param r2 Radius of arrival orbit (km)
 */
export function computeTransfer(mu: number, r1: number, r2: number): TransferResult {
  const v1 = Math.sqrt(mu / r1);
  const v2 = Math.sqrt(mu / r2);

  const aTransfer = (r1 + r2) / 2;
  const vTransfer1 = Math.sqrt(mu * (2 / r1 - 1 / aTransfer)); // transfer ellipse at r1
  const vTransfer2 = Math.sqrt(mu * (2 / r2 - 1 / aTransfer)); // transfer ellipse at r2

  const dv1 = Math.abs(vTransfer1 - v1);
  const dv2 = Math.abs(v2 - vTransfer2);

  // Half the transfer ellipse's period
  const timeOfFlight = Math.PI * Math.sqrt(aTransfer ** 3 / mu);

  return {
    dv1,
    dv2,
    dvTotal: dv1 + dv2,
    timeOfFlight,
    transferSemiMajorAxis: aTransfer,
  };
}
