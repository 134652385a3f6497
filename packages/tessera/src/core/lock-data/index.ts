export { defineLockData } from "./lock-data";
export type {
    AccessMode,
    Acquisition,
    Borrowed,
    FieldDecl,
    LockBindings,
    LockDataCallback,
    LockDataDefinition,
} from "./types";
