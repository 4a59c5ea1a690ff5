import { generateText, NoObjectGeneratedError, Output, stepCountIs, streamText } from "ai";
import type { LanguageModel, ModelMessage } from "ai";

import { ModelResponseFormatError } from "@/lib/errors";

import type { AgentCapability, AgentRunResult } from "../types";
import type { SupportDependencies } from "./dependencies";
import { buildSystemPrompt } from "./prompt";
import { supportOutputSchema, type SupportOutput } from "./schemas";
import { bankSupportTools } from "./tools";

const DEFAULT_MAX_STEPS = 5;

export type BankSupportAgentOptions = {
  getModel: () => LanguageModel;
  maxSteps?: number;
};

/**
 * Messages that open a new turn. A thread's first turn also carries the
 * system prompt so it is persisted with the rest of the conversation.
 */
export async function buildTurnMessages(
  query: string,
  history: ModelMessage[],
  deps: SupportDependencies
): Promise<ModelMessage[]> {
  const turn: ModelMessage[] = [];
  if (history.length === 0) {
    const customerName = await deps.db.customerName(deps.customerId);
    turn.push({ role: "system", content: buildSystemPrompt(customerName) });
  }
  turn.push({ role: "user", content: query });
  return turn;
}

export function parseSupportOutput(text: string): SupportOutput {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new ModelResponseFormatError("The model response is not valid JSON");
  }

  const parsed = supportOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new ModelResponseFormatError(
      `The model response has an incorrect format: ${parsed.error.message}`
    );
  }
  return parsed.data;
}

function toAgentError(error: unknown): unknown {
  if (NoObjectGeneratedError.isInstance(error)) {
    return new ModelResponseFormatError(
      `The model response has an incorrect format: ${error.message}`
    );
  }
  return error;
}

export function createBankSupportAgent({
  getModel,
  maxSteps = DEFAULT_MAX_STEPS,
}: BankSupportAgentOptions): AgentCapability<SupportDependencies, SupportOutput> {
  const output = Output.object({ schema: supportOutputSchema });

  return {
    async run(query, history, deps, options) {
      const turn = await buildTurnMessages(query, history, deps);

      try {
        const result = await generateText({
          model: getModel(),
          messages: [...history, ...turn],
          tools: bankSupportTools,
          stopWhen: stepCountIs(maxSteps),
          experimental_output: output,
          experimental_context: deps,
          abortSignal: options?.abortSignal,
        });

        return {
          output: result.experimental_output,
          newMessages: [...turn, ...result.response.messages],
        };
      } catch (error) {
        throw toAgentError(error);
      }
    },

    runStream(query, history, deps, options) {
      let completed: AgentRunResult<SupportOutput> | null = null;

      async function* partialOutputs(): AsyncGenerator<unknown> {
        const turn = await buildTurnMessages(query, history, deps);
        let streamError: unknown;

        const result = streamText({
          model: getModel(),
          messages: [...history, ...turn],
          tools: bankSupportTools,
          stopWhen: stepCountIs(maxSteps),
          experimental_output: output,
          experimental_context: deps,
          abortSignal: options?.abortSignal,
          onError: ({ error }) => {
            streamError = error;
          },
        });

        for await (const partial of result.experimental_partialOutputStream) {
          yield partial;
        }

        if (streamError !== undefined) {
          throw toAgentError(streamError);
        }
        options?.abortSignal?.throwIfAborted();

        const [text, response] = await Promise.all([result.text, result.response]);
        completed = {
          output: parseSupportOutput(text),
          newMessages: [...turn, ...response.messages],
        };
      }

      return {
        partialOutputs: partialOutputs(),
        async result() {
          if (!completed) {
            throw new Error("Agent stream was not consumed to completion");
          }
          return completed;
        },
      };
    },
  };
}
