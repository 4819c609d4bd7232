import type { HealthWindow } from "../types/backend.ts";
import type { BackendTarget } from "../types/prediction.ts";

/**
 * BackendState is everything the registry tracks for one target.
 */
export interface BackendState {
  target: BackendTarget;
  health: HealthWindow;
}
