import { EventEmitter } from "node:events";
import { GameEventType } from "../../../shared/constants/EventEnums";
import type { AnimalType } from "../../../shared/constants/AnimalEnums";
import type { ResourceType } from "../../../shared/constants/ResourceEnums";
import type {
  Animal,
  DeathRecord,
  HuntRecord,
} from "../../types/simulation/animals";
import type { EnvironmentEventRecord } from "../../types/simulation/resources";
import type { TurnReport } from "../../types/simulation/ecosystem";

/**
 * Payload carried by each simulation event.
 */
export interface SimulationEventMap {
  [GameEventType.TURN_COMPLETED]: TurnReport;
  [GameEventType.ANIMAL_BORN]: Animal;
  [GameEventType.ANIMAL_INTRODUCED]: Animal;
  [GameEventType.ANIMAL_DIED]: DeathRecord;
  [GameEventType.ANIMAL_HUNTED]: HuntRecord;
  [GameEventType.ENVIRONMENT_EVENT]: EnvironmentEventRecord;
  [GameEventType.RESOURCES_ADDED]: { type: ResourceType; amount: number };
  [GameEventType.SPECIES_EXTINCT]: { type: AnimalType; turn: number };
}

export type SimulationEventListener<E extends GameEventType> = (
  payload: SimulationEventMap[E],
) => void;

/**
 * Creates the event bus of one simulation engine.
 */
export function createSimulationEvents(): EventEmitter {
  const emitter = new EventEmitter();
  emitter.setMaxListeners(50);
  return emitter;
}

/**
 * Game event type enum.
 * The engine emits these on its bus; the HTTP layer and tests listen.
 */
export { GameEventType };
