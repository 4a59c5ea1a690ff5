import { tool } from "ai";

import { getSupportDependencies } from "./dependencies";
import {
  blockCustomerCardInputSchema,
  getBalanceInputSchema,
  getRecentTransactionsInputSchema,
} from "./schemas";

export const bankSupportTools = {
  getBalance: tool({
    description: "Return the customer's current account balance.",
    inputSchema: getBalanceInputSchema,
    execute: async (input, options) => {
      const deps = getSupportDependencies(options.experimental_context);
      return deps.db.customerBalance(deps.customerId, input.includePending);
    },
  }),
  getRecentTransactions: tool({
    description: "Return the customer's most recent transactions, newest first.",
    inputSchema: getRecentTransactionsInputSchema,
    execute: async (input, options) => {
      const deps = getSupportDependencies(options.experimental_context);
      return deps.db.recentTransactions(deps.customerId, input.limit);
    },
  }),
  blockCustomerCard: tool({
    description:
      "Block the customer's card. Only use this for a security concern or a card reported lost or stolen.",
    inputSchema: blockCustomerCardInputSchema,
    execute: async (_input, options) => {
      const deps = getSupportDependencies(options.experimental_context);
      return deps.db.blockCard(deps.customerId);
    },
  }),
};
