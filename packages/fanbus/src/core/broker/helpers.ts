import { Broker } from "./broker";
import type { BrokerConfig } from "./types";

export function createBroker(config?: BrokerConfig): Broker {
    return new Broker(config);
}
