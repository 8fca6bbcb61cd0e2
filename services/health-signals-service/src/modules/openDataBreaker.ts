import { CircuitBreaker } from "./circuitBreaker";

export const openDataBreaker = new CircuitBreaker({
    name: "nyc-open-data-311",
    failureThreshold: 3,
    cooldownMs: 15 * 60_000,
});
