import type { ModelMessage } from "ai";

import type { AgentCapability, AgentRunResult } from "../types";
import { buildTurnMessages } from "./agent";
import type { SupportDependencies } from "./dependencies";
import type { SupportOutput } from "./schemas";

const LOST_CARD_PATTERN = /\b(lost|stolen|stole)\b/i;
const BALANCE_PATTERN = /\bbalance\b/i;
const TRANSACTIONS_PATTERN = /\btransactions?\b/i;

function formatAmount(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

async function composeReply(query: string, deps: SupportDependencies): Promise<SupportOutput> {
  if (LOST_CARD_PATTERN.test(query)) {
    const blocked = await deps.db.blockCard(deps.customerId);
    return {
      supportAdvice: blocked
        ? "I've blocked your card to prevent unauthorized transactions."
        : "I could not block your card. Please call us right away.",
      blockCard: blocked,
      riskLevel: 8,
      followUpActions: ["Order a replacement card", "Review your recent transactions"],
    };
  }

  if (BALANCE_PATTERN.test(query)) {
    const balance = await deps.db.customerBalance(deps.customerId, true);
    return {
      supportAdvice: `Your current balance, including pending transactions, is ${formatAmount(balance)}.`,
      blockCard: false,
      riskLevel: 1,
      followUpActions: [],
    };
  }

  if (TRANSACTIONS_PATTERN.test(query)) {
    const transactions = await deps.db.recentTransactions(deps.customerId, 5);
    const summary = transactions
      .map((entry) => `${entry.date} ${entry.description} ${formatAmount(entry.amount)}`)
      .join("; ");
    return {
      supportAdvice: `Here are your ${transactions.length} most recent transactions: ${summary}.`,
      blockCard: false,
      riskLevel: 1,
      followUpActions: ["Report any transaction you do not recognise"],
    };
  }

  return {
    supportAdvice: "Mock response. Ask about your balance, transactions or a lost card.",
    blockCard: false,
    riskLevel: 0,
    followUpActions: [],
  };
}

async function answer(
  query: string,
  history: ModelMessage[],
  deps: SupportDependencies
): Promise<AgentRunResult<SupportOutput>> {
  const turn = await buildTurnMessages(query, history, deps);
  const output = await composeReply(query, deps);
  return {
    output,
    newMessages: [
      ...turn,
      { role: "assistant", content: [{ type: "text", text: JSON.stringify(output) }] },
    ],
  };
}

/**
 * Deterministic stand-in for the live bank support agent. Answers from the
 * bank database without a model and streams two snapshots per answer.
 */
export const scriptedBankSupportAgent: AgentCapability<SupportDependencies, SupportOutput> = {
  run(query, history, deps) {
    return answer(query, history, deps);
  },

  runStream(query, history, deps, options) {
    let completed: AgentRunResult<SupportOutput> | null = null;

    async function* partialOutputs(): AsyncGenerator<unknown> {
      const result = await answer(query, history, deps);
      const words = result.output.supportAdvice.split(" ");
      const head = words.slice(0, Math.ceil(words.length / 2)).join(" ");

      yield { supportAdvice: head };
      options?.abortSignal?.throwIfAborted();
      yield result.output;

      completed = result;
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
