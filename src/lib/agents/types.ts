import type { ModelMessage } from "ai";

export type AgentRunOptions = {
  abortSignal?: AbortSignal;
};

export type AgentRunResult<TOutput> = {
  output: TOutput;
  /** Messages produced by this run, in order, starting with the new user turn. */
  newMessages: ModelMessage[];
};

export type AgentStreamRun<TOutput> = {
  /** Successive snapshots of the structured output as it is generated. */
  partialOutputs: AsyncIterable<unknown>;
  /** Final output and new messages; available once `partialOutputs` is exhausted. */
  result(): Promise<AgentRunResult<TOutput>>;
};

export interface AgentCapability<TDeps = unknown, TOutput = unknown> {
  run(
    query: string,
    history: ModelMessage[],
    deps: TDeps,
    options?: AgentRunOptions
  ): Promise<AgentRunResult<TOutput>>;
  runStream(
    query: string,
    history: ModelMessage[],
    deps: TDeps,
    options?: AgentRunOptions
  ): AgentStreamRun<TOutput>;
}

export interface AgentDefinition<TDeps = unknown, TOutput = unknown> {
  capability: AgentCapability<TDeps, TOutput>;
  buildDependencies(userId: string): TDeps;
}
