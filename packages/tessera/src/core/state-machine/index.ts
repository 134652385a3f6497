export { StateMachine } from "./state-machine";
export type { StateMachineConfig, TransitionListener, TransitionTable } from "./types";
