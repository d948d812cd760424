export { toStaticBindings } from "./bindings";
export { scan } from "./scanner";
export type { ScannedHandler, ScannedSubscription, ScanOptions, ScanResult } from "./types";
