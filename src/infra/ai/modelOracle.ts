import { createComponentLogger } from "../logging/logger.js";
import { TextGenerator } from "./types.js";

export type OraclePurpose =
  | "persona_job"
  | "domain_vocabulary"
  | "batch_scoring"
  | "excerpt_refinement";

export type OracleFailureReason =
  | "unavailable"
  | "budget_exhausted"
  | "error"
  | "empty"
  | "unparseable";

export type OracleResult<T> =
  | { ok: true; value: T; raw: string }
  | { ok: false; value: T; reason: OracleFailureReason };

export interface OracleRequest<T> {
  purpose: OraclePurpose;
  prompt: string;
  maxTokens: number;
  temperature: number;
  stop?: string[];
  parse: (text: string) => T | null;
  fallback: T;
}

export interface OracleOptions {
  maxCalls: number;
  maxTokensCeiling: number;
  gate?: CallGate;
}

const log = createComponentLogger("model-oracle");

export class CallGate {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

/**
 * Wraps the text generator with a per-run call budget, a token ceiling and a
 * mandatory fallback. `complete` never rejects and never retries: every
 * failure comes back as `{ ok: false, value: fallback }`.
 */
export class BudgetedModelOracle {
  private callsMade = 0;

  private readonly gate: CallGate;

  constructor(
    private readonly generator: TextGenerator | null,
    private readonly options: OracleOptions,
  ) {
    this.gate = options.gate ?? new CallGate();
  }

  get isAvailable(): boolean {
    return this.generator !== null;
  }

  get callCount(): number {
    return this.callsMade;
  }

  get remainingCalls(): number {
    return Math.max(0, this.options.maxCalls - this.callsMade);
  }

  complete<T>(request: OracleRequest<T>): Promise<OracleResult<T>> {
    return this.gate.run(() => this.attempt(request));
  }

  private async attempt<T>(request: OracleRequest<T>): Promise<OracleResult<T>> {
    if (!this.generator) {
      return this.fail(request, "unavailable");
    }
    if (this.callsMade >= this.options.maxCalls) {
      return this.fail(request, "budget_exhausted");
    }

    this.callsMade += 1;
    const maxTokens = Math.max(1, Math.min(request.maxTokens, this.options.maxTokensCeiling));
    const startedAt = Date.now();

    let raw: string;
    try {
      raw = await this.generator.generate({
        prompt: request.prompt,
        maxTokens,
        temperature: request.temperature,
        stop: request.stop,
      });
    } catch (error) {
      log.warn(
        { err: error, purpose: request.purpose, latencyMs: Date.now() - startedAt },
        "Model call failed, using fallback",
      );
      return this.fail(request, "error");
    }

    log.debug(
      { purpose: request.purpose, maxTokens, latencyMs: Date.now() - startedAt },
      "Model call completed",
    );

    if (!raw.trim()) {
      return this.fail(request, "empty");
    }

    let parsed: T | null;
    try {
      parsed = request.parse(raw);
    } catch (error) {
      log.warn({ err: error, purpose: request.purpose }, "Model output parser threw");
      parsed = null;
    }

    if (parsed === null) {
      return this.fail(request, "unparseable");
    }
    return { ok: true, value: parsed, raw };
  }

  private fail<T>(request: OracleRequest<T>, reason: OracleFailureReason): OracleResult<T> {
    if (reason !== "unavailable") {
      log.info({ purpose: request.purpose, reason }, "Oracle fell back");
    }
    return { ok: false, value: request.fallback, reason };
  }
}
