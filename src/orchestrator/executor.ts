import { randomUUID } from "node:crypto";
import type { ChainDefinition, ChainResult, ChainStatus, ExecutionMode } from "../types/chain.js";
import type { EventSink } from "../types/events.js";
import type { OperationRegistry } from "../types/operations.js";
import { loadEngineConfig, type EngineConfig } from "../config.js";
import { compileChain } from "./compiler.js";
import { ChainConfigError } from "./errors.js";
import { runChain } from "./run.js";

export interface ExecutorDeps<C = unknown> {
  registry: OperationRegistry<C>;
  context: C;
  /** Named chains that `execute` accepts by name. */
  chains?: Record<string, ChainDefinition>;
  sink?: EventSink;
  config?: Partial<EngineConfig>;
  /** Check operation names at load time. Defaults to true. */
  validateOperations?: boolean;
}

export interface ExecuteOptions {
  mode?: ExecutionMode;
  chainName?: string;
  signal?: AbortSignal;
}

export type ExecutorStatus = "pending" | "running" | ChainStatus;

export class ChainExecutor<C = unknown> {
  private readonly config: EngineConfig;
  private _status: ExecutorStatus = "pending";
  private _chainId: string | undefined;

  constructor(private readonly deps: ExecutorDeps<C>) {
    this.config = { ...loadEngineConfig(), ...deps.config };
  }

  get status(): ExecutorStatus {
    return this._status;
  }

  get currentChainId(): string | undefined {
    return this._chainId;
  }

  /**
   * Runs a chain to completion. Only configuration errors found before the
   * first step throw; every operation failure ends up in the result.
   */
  async execute(
    chainOrName: string | ChainDefinition,
    initialState: Record<string, unknown> = {},
    opts: ExecuteOptions = {}
  ): Promise<ChainResult> {
    const mode = opts.mode ?? this.config.defaultMode;
    this._chainId = undefined;
    try {
      const draft = typeof chainOrName === "string" ? this.named(chainOrName) : chainOrName;
      const chain = compileChain(draft, {
        mode,
        registry: this.deps.validateOperations === false ? undefined : this.deps.registry
      });

      const chainId = randomUUID();
      this._chainId = chainId;
      this._status = "running";
      const result = await runChain({
        chain,
        registry: this.deps.registry,
        context: this.deps.context,
        initialState,
        mode,
        chainId,
        chainName: opts.chainName ?? chain.definition.chain_name ?? (typeof chainOrName === "string" ? chainOrName : undefined),
        sink: this.deps.sink,
        signal: opts.signal,
        maxTransitions: this.config.maxTransitions
      });
      this._status = result.status;
      return result;
    } catch (e) {
      this._status = "failed";
      throw e;
    }
  }

  private named(name: string): ChainDefinition {
    const chains = this.deps.chains ?? {};
    if (!Object.hasOwn(chains, name)) throw new ChainConfigError(`Unknown chain '${name}'`);
    return chains[name];
  }
}
