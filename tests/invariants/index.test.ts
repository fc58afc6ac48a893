/**
 * Invariant Tests
 *
 * Tests invariants across a cartesian product of:
 * - Scenes (three-point arcs)
 * - Modes (linearizeArc, linearizeCircle)
 * - Invariants (assertions that must always hold)
 *
 * Narrow a run with environment variables:
 * - INVARIANT_FOCUS_SCENE=offset-circle
 * - INVARIANT_FOCUS_INVARIANT=chord-error
 *
 * Example:
 *   INVARIANT_FOCUS_SCENE=offset-circle npm test -- tests/invariants/
 */

import { describe, it } from "vitest";
import { ALL_INVARIANTS } from "./invariants";
import { computeContext } from "./runner";
import { ALL_SCENES } from "./scenes";
import type { LinearizationMode } from "./types";

const FOCUS = {
  scene: process.env.INVARIANT_FOCUS_SCENE,
  invariant: process.env.INVARIANT_FOCUS_INVARIANT,
};

const MODES: readonly LinearizationMode[] = ["arc", "circle"];

const scenes = ALL_SCENES.filter((s) => !FOCUS.scene || s.name === FOCUS.scene);
const invariants = ALL_INVARIANTS.filter((inv) => !FOCUS.invariant || inv.id === FOCUS.invariant);

describe("Arc linearization invariants", () => {
  for (const scene of scenes) {
    describe(`${scene.name}: ${scene.description}`, () => {
      for (const mode of MODES) {
        describe(mode, () => {
          for (const invariant of invariants) {
            it(invariant.name, () => {
              invariant.assert(computeContext(scene, mode));
            });
          }
        });
      }
    });
  }
});
