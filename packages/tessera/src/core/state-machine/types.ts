/** Allowed targets per state. A state with no targets is terminal. */
export type TransitionTable<TState extends string> = Readonly<Record<TState, readonly TState[]>>;

export type StateMachineConfig<TState extends string> = {
    transitions: TransitionTable<TState>;
    initial: TState;
    /** Owner name used in error messages. */
    name?: string;
};

export type TransitionListener<TState extends string> = (from: TState, to: TState) => void;
