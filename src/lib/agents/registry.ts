import { z } from "zod";

import { AGENT_TYPES, type AgentType } from "@/lib/db/tables";
import { env } from "@/lib/env";
import { AgentTypeError } from "@/lib/errors";

import { createBankSupportAgent } from "./bank-support/agent";
import { buildSupportDependencies } from "./bank-support/dependencies";
import { scriptedBankSupportAgent } from "./bank-support/mock-agent";
import { getChatModel } from "./model";
import type { AgentDefinition } from "./types";

export const agentTypeSchema = z.enum(AGENT_TYPES, {
  error: (issue) =>
    issue.input === undefined
      ? "agent_type is required"
      : `Unsupported agent type: ${String(issue.input)}`,
});

export type AgentTable = Partial<Record<AgentType, AgentDefinition>>;

export const liveAgents: AgentTable = {
  bank_support: {
    capability: createBankSupportAgent({ getModel: getChatModel }),
    buildDependencies: (userId) => buildSupportDependencies(userId),
  },
};

export const scriptedAgents: AgentTable = {
  bank_support: {
    capability: scriptedBankSupportAgent,
    buildDependencies: (userId) => buildSupportDependencies(userId),
  },
};

export function getAgentTable(): AgentTable {
  return env.MOCK_AGENT === "1" ? scriptedAgents : liveAgents;
}

/** Looks up the capability for a thread's agent type. Throws AgentTypeError. */
export function resolveAgent(
  agentType: string | null | undefined,
  agents: AgentTable = getAgentTable()
): AgentDefinition {
  if (!agentType) {
    throw new AgentTypeError("Thread must have a valid agent_type");
  }

  const parsed = agentTypeSchema.safeParse(agentType);
  const definition = parsed.success ? agents[parsed.data] : undefined;
  if (!definition) {
    throw new AgentTypeError(`Unsupported agent type: ${agentType}`);
  }
  return definition;
}
