export enum LoopState {
    Created = "created",
    Running = "running",
    Stopped = "stopped",
}
