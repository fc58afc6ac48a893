/**
 * Invariant Definitions
 *
 * Exports all invariants to be tested.
 */

import type { Invariant } from "../types";
import { auxiliaryLinearityInvariant } from "./auxiliary-linearity";
import { chordErrorInvariant } from "./chord-error";
import { determinismInvariant } from "./determinism";
import { endpointExactnessInvariant } from "./endpoint-exactness";
import { monotonicAngleInvariant } from "./monotonic-angle";

export const ALL_INVARIANTS: Invariant[] = [
  endpointExactnessInvariant,
  chordErrorInvariant,
  monotonicAngleInvariant,
  auxiliaryLinearityInvariant,
  determinismInvariant,
];
