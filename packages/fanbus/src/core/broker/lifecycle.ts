import { LifecycleError } from "../errors";
import type { LoggerContext } from "../types";
import { BrokerState } from "./enums";

const TRANSITIONS: Record<BrokerState, readonly BrokerState[]> = {
    [BrokerState.CREATED]: [BrokerState.STARTING],
    [BrokerState.STARTING]: [BrokerState.READY, BrokerState.FAILED],
    [BrokerState.READY]: [BrokerState.STOPPING],
    [BrokerState.STOPPING]: [BrokerState.STOPPED],
    [BrokerState.STOPPED]: [],
    [BrokerState.FAILED]: [],
};

/** Broker state plus the legal moves between states. Illegal moves throw {@link LifecycleError}. */
export class BrokerLifecycle {
    private current: BrokerState = BrokerState.CREATED;

    constructor(private readonly logger: LoggerContext) {}

    get state(): BrokerState {
        return this.current;
    }

    moveTo(target: BrokerState): void {
        const from = this.current;
        if (!TRANSITIONS[from].includes(target)) {
            throw new LifecycleError(`Illegal transition: "${from}" → "${target}" for "Broker"`);
        }
        this.current = target;
        this.logger.debug("Broker", `State ${from} → ${target}`);
    }

    require(...allowed: BrokerState[]): void {
        if (allowed.includes(this.current)) return;
        const list = allowed.map((s) => `"${s}"`).join(", ");
        throw new LifecycleError(`"Broker" expected state ${list}, but current is "${this.current}"`);
    }
}
