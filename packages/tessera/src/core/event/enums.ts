/** Result of one listener attempt. */
export enum ListenOutcome {
    /** Every capability was acquired and the reaction ran. */
    Success = "success",
    /** A capability exists but is locked in a conflicting mode. Retried within the same dispatch. */
    LockUnavailable = "lock-unavailable",
    /** A capability no longer exists. The listener is evicted and never runs again. */
    RequirementDeleted = "requirement-deleted",
}

export enum RetryStrategy {
    Fixed = "fixed",
    Exponential = "exponential",
}
