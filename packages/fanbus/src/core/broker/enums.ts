export enum BrokerState {
    CREATED = "created",
    STARTING = "starting",
    READY = "ready",
    STOPPING = "stopping",
    STOPPED = "stopped",
    FAILED = "failed",
}
