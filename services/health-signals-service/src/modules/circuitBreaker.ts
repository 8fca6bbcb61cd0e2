import { logger } from "../logger";

export type CircuitBreakerConfig = {
    name: string;
    failureThreshold: number;
    cooldownMs: number;
};

export type BreakerState = "closed" | "open" | "half_open";

/**
 * Consecutive-failure breaker. Once the cooldown has elapsed the breaker is
 * half-open: the next request goes through, and a failure reopens it at once.
 */
export class CircuitBreaker {
    private consecutiveFailures = 0;
    private openUntil = 0;

    constructor(private readonly config: CircuitBreakerConfig) {}

    get name(): string {
        return this.config.name;
    }

    current(): BreakerState {
        if (this.openUntil === 0) return "closed";
        return this.openUntil > Date.now() ? "open" : "half_open";
    }

    guard(): boolean {
        const state = this.current();

        if (state === "open") {
            logger.warn(
                { breaker: this.config.name, openUntil: new Date(this.openUntil).toISOString() },
                "Circuit breaker open, skipping upstream request"
            );
            return false;
        }

        if (state === "half_open") {
            logger.info({ breaker: this.config.name }, "Circuit breaker half-open, probing upstream");
        }
        return true;
    }

    success(): void {
        if (this.consecutiveFailures > 0) {
            logger.info({ breaker: this.config.name }, "Circuit breaker reset after successful request");
        }
        this.consecutiveFailures = 0;
        this.openUntil = 0;
    }

    failure(err?: unknown): void {
        this.consecutiveFailures++;
        const probing = this.current() === "half_open";

        if (!probing && this.consecutiveFailures < this.config.failureThreshold) {
            logger.warn(
                {
                    breaker: this.config.name,
                    failures: this.consecutiveFailures,
                    err: err instanceof Error ? err.message : String(err),
                },
                "Upstream request failed"
            );
            return;
        }

        this.openUntil = Date.now() + this.config.cooldownMs;
        logger.error(
            { breaker: this.config.name, failures: this.consecutiveFailures, cooldownMs: this.config.cooldownMs },
            probing ? "Circuit breaker reopened after failed probe" : "Circuit breaker opened"
        );
    }
}
