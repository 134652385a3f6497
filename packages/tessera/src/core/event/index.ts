export { ListenOutcome, RetryStrategy } from "./enums";
export { EventHandler } from "./event-handler";
export { fanOut } from "./fan-out";
export { DEFAULT_RETRY_POLICY, computeRetryDelay } from "./retry";
export type {
    DispatchOptions,
    DispatchSummary,
    EventHandlerOptions,
    Listener,
    ListenerId,
    RetryPolicy,
} from "./types";
