import { z } from "zod";

export const supportOutputSchema = z.object({
  supportAdvice: z.string().describe("Advice returned to the customer"),
  blockCard: z.boolean().describe("Whether to block the customer's card"),
  riskLevel: z.number().int().min(0).max(10).describe("Risk level of the query, 0-10"),
  followUpActions: z
    .array(z.string())
    .describe("Recommended follow-up actions for the customer"),
});

export type SupportOutput = z.infer<typeof supportOutputSchema>;

export const getBalanceInputSchema = z.object({
  includePending: z
    .boolean()
    .default(true)
    .describe("Whether to include pending transactions"),
});

export const getRecentTransactionsInputSchema = z.object({
  limit: z
    .number()
    .int()
    .min(1)
    .max(50)
    .default(5)
    .describe("Maximum number of transactions to return"),
});

export const blockCustomerCardInputSchema = z.object({});

export const transactionSchema = z.object({
  date: z.string(),
  description: z.string(),
  amount: z.number(),
});

export type Transaction = z.infer<typeof transactionSchema>;
