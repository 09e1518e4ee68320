/**
 * Circuit Breaker - failure isolation for one external dependency
 *
 *   CLOSED --(consecutive failures >= threshold)--> OPEN
 *   OPEN   --(now >= cooldownUntil)---------------> HALF_OPEN
 *   HALF_OPEN --(trial succeeds)------------------> CLOSED (failures reset)
 *   HALF_OPEN --(trial fails)---------------------> OPEN (cooldown restarts)
 *
 * While OPEN, calls fail fast with CircuitOpenError and the wrapped function
 * is never invoked. HALF_OPEN admits exactly one trial call; everything else
 * arriving while the trial is in flight is refused the same way.
 *
 * Each transition starts a new generation. A call admitted in an earlier
 * generation still counts in the totals when it settles, but cannot move
 * the state: a slow success from before a trip never closes the circuit.
 */

import type { Logger } from "../utils/logger.util";
import {
  CircuitOpenError,
  DependencyTimeoutError,
  formatError,
} from "../errors/app.errors";
import { withTimeout } from "../utils/timeout.util";
import { systemClock, type Clock } from "./clock";
import type { CircuitBreakerState, CircuitStatus } from "./types";

export interface CircuitBreakerConfig {
  /** Consecutive failures before opening (default: 5) */
  failureThreshold?: number;
  /** Seconds to stay open before the trial call (default: 300) */
  cooldownSeconds?: number;
  /** Default per-call time budget in ms; 0 disables (default: 0) */
  timeoutMs?: number;
}

const DEFAULT_CONFIG: Required<CircuitBreakerConfig> = {
  failureThreshold: 5,
  cooldownSeconds: 300,
  timeoutMs: 0,
};

export interface ExecuteOptions {
  /** Overrides the breaker's default timeout for this call */
  timeoutMs?: number;
}

/** Admission record carried by one call */
interface Ticket {
  generation: number;
  trial: boolean;
}

export class CircuitBreaker {
  private readonly config: Required<CircuitBreakerConfig>;

  private status: CircuitStatus = "CLOSED";
  private consecutiveFailures = 0;
  private openedAt: number | null = null;
  private cooldownUntil: number | null = null;
  private trialInFlight = false;
  private generation = 0;
  private totalFailures = 0;
  private totalSuccesses = 0;

  constructor(
    readonly dependency: string,
    config: CircuitBreakerConfig,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Run `fn` under the breaker. Rejects with CircuitOpenError without calling
   * `fn` while open, and with DependencyTimeoutError when the budget runs out.
   */
  async execute<T>(fn: () => Promise<T>, options: ExecuteOptions = {}): Promise<T> {
    const ticket = this.admit();

    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    try {
      const operation = fn();
      const result =
        timeoutMs > 0
          ? await withTimeout(
              operation,
              timeoutMs,
              () => new DependencyTimeoutError(this.dependency, timeoutMs),
            )
          : await operation;
      this.onSuccess(ticket);
      return result;
    } catch (err) {
      this.onFailure(ticket, err);
      throw err;
    }
  }

  getState(): CircuitBreakerState {
    return {
      dependency: this.dependency,
      status: this.currentStatus(),
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt,
      cooldownUntil: this.cooldownUntil,
      totalFailures: this.totalFailures,
      totalSuccesses: this.totalSuccesses,
    };
  }

  reset(): void {
    this.status = "CLOSED";
    this.consecutiveFailures = 0;
    this.openedAt = null;
    this.cooldownUntil = null;
    this.trialInFlight = false;
    this.generation++;
    this.logger.info(`[CircuitBreaker:${this.dependency}] Reset`);
  }

  /**
   * Status as of now; an expired cooldown reads as HALF_OPEN
   */
  private currentStatus(): CircuitStatus {
    if (
      this.status === "OPEN" &&
      this.cooldownUntil !== null &&
      this.clock.now() >= this.cooldownUntil
    ) {
      return "HALF_OPEN";
    }
    return this.status;
  }

  private admit(): Ticket {
    const status = this.currentStatus();

    if (status === "OPEN") {
      throw new CircuitOpenError(this.dependency, this.cooldownUntil ?? this.clock.now());
    }

    if (status === "HALF_OPEN") {
      if (this.trialInFlight) {
        throw new CircuitOpenError(this.dependency, this.cooldownUntil ?? this.clock.now());
      }
      this.status = "HALF_OPEN";
      this.trialInFlight = true;
      this.generation++;
      this.logger.info(`[CircuitBreaker:${this.dependency}] Half-open: sending trial call`);
      return { generation: this.generation, trial: true };
    }

    return { generation: this.generation, trial: false };
  }

  private isStale(ticket: Ticket, outcome: string): boolean {
    if (ticket.generation === this.generation) return false;
    this.logger.debug(
      `[CircuitBreaker:${this.dependency}] Ignoring late ${outcome} from an earlier state`,
    );
    return true;
  }

  private onSuccess(ticket: Ticket): void {
    this.totalSuccesses++;
    if (this.isStale(ticket, "success")) return;

    this.consecutiveFailures = 0;
    if (ticket.trial) {
      this.logger.info(`[CircuitBreaker:${this.dependency}] ✅ Trial succeeded, circuit closed`);
      this.status = "CLOSED";
      this.openedAt = null;
      this.cooldownUntil = null;
      this.trialInFlight = false;
      this.generation++;
    }
  }

  private onFailure(ticket: Ticket, err: unknown): void {
    this.totalFailures++;
    if (this.isStale(ticket, "failure")) return;

    this.consecutiveFailures++;
    if (ticket.trial) {
      this.trialInFlight = false;
      this.trip(`trial failed: ${formatError(err)}`);
      return;
    }

    if (this.consecutiveFailures >= this.config.failureThreshold) {
      this.trip(`${this.consecutiveFailures} consecutive failures, last: ${formatError(err)}`);
    } else {
      this.logger.debug(
        `[CircuitBreaker:${this.dependency}] Failure ${this.consecutiveFailures}/${this.config.failureThreshold}: ${formatError(err)}`,
      );
    }
  }

  private trip(reason: string): void {
    const now = this.clock.now();
    this.status = "OPEN";
    this.openedAt = now;
    this.cooldownUntil = now + this.config.cooldownSeconds * 1000;
    this.generation++;
    this.logger.warn(
      `[CircuitBreaker:${this.dependency}] ⚡ Opened (${reason}); cooling down ${this.config.cooldownSeconds}s`,
    );
  }
}

/**
 * One breaker per dependency name, created on first use
 */
export class CircuitBreakerRegistry {
  private breakers: Map<string, CircuitBreaker> = new Map();

  constructor(
    private readonly config: CircuitBreakerConfig,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock,
  ) {}

  get(dependency: string): CircuitBreaker {
    let breaker = this.breakers.get(dependency);
    if (!breaker) {
      breaker = new CircuitBreaker(dependency, this.config, this.logger, this.clock);
      this.breakers.set(dependency, breaker);
    }
    return breaker;
  }

  circuitState(dependency: string): CircuitBreakerState {
    return this.get(dependency).getState();
  }

  states(): CircuitBreakerState[] {
    return Array.from(this.breakers.values(), (b) => b.getState());
  }
}
