import type { StateMachineConfig, TransitionListener, TransitionTable } from "./types";

/** Finite lifecycle guard for objects such as the frame loop. */
export class StateMachine<TState extends string> {
    private state: TState;
    private readonly table: TransitionTable<TState>;
    private readonly owner: string;
    private readonly listeners = new Set<TransitionListener<TState>>();

    constructor(config: StateMachineConfig<TState>) {
        this.state = config.initial;
        this.table = config.transitions;
        this.owner = config.name ?? "StateMachine";
    }

    get current(): TState {
        return this.state;
    }

    /** Whether no transition leaves the current state. */
    get terminal(): boolean {
        return this.table[this.state].length === 0;
    }

    is(...states: TState[]): boolean {
        return states.includes(this.state);
    }

    canTransition(target: TState): boolean {
        return this.table[this.state].includes(target);
    }

    transition(target: TState): void {
        if (!this.canTransition(target)) {
            throw new Error(`[tessera] ${this.owner}: cannot go from "${this.state}" to "${target}"`);
        }
        const from = this.state;
        this.state = target;
        for (const listener of this.listeners) {
            listener(from, target);
        }
    }

    /** Throws unless the current state is one of `allowed`. `operation` names the caller in the message. */
    assertState(operation: string, ...allowed: TState[]): void {
        if (this.is(...allowed)) return;
        const expected = allowed.map((state) => `"${state}"`).join(" or ");
        throw new Error(`[tessera] ${this.owner}.${operation}: expected ${expected}, but state is "${this.state}"`);
    }

    onTransition(listener: TransitionListener<TState>): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }
}
