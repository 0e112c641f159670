import type { EnvironmentEvent } from "../../../shared/constants/EnvironmentEnums";

export interface ResourceLevels {
  grass: number;
  water: number;
}

/**
 * Change applied to the pool by one environmental event.
 */
export interface EnvironmentEventRecord {
  kind: EnvironmentEvent;
  grassDelta: number;
  waterDelta: number;
}
