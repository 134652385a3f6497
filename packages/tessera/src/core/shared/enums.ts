export enum LockMode {
    Read = "read",
    Write = "write",
}
