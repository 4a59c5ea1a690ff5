import type { Transaction } from "./schemas";

/** Read and write access to customer banking data used by the support tools. */
export interface BankDatabase {
  customerName(customerId: number): Promise<string>;
  customerBalance(customerId: number, includePending: boolean): Promise<number>;
  recentTransactions(customerId: number, limit: number): Promise<Transaction[]>;
  blockCard(customerId: number): Promise<boolean>;
}

const DEMO_TRANSACTIONS: Transaction[] = [
  { date: "2023-06-15", description: "Grocery Store", amount: -78.52 },
  { date: "2023-06-14", description: "Salary Deposit", amount: 2500.0 },
  { date: "2023-06-12", description: "Restaurant", amount: -45.67 },
  { date: "2023-06-10", description: "Gas Station", amount: -35.4 },
  { date: "2023-06-08", description: "Online Shopping", amount: -112.99 },
];

/**
 * Fixed demo data: every customer is "John Doe" with the same balance and
 * history. Card blocking always succeeds.
 */
export class DemoBankDatabase implements BankDatabase {
  async customerName(_customerId: number): Promise<string> {
    return "John Doe";
  }

  async customerBalance(_customerId: number, includePending: boolean): Promise<number> {
    return includePending ? 1123.45 : 1234.56;
  }

  async recentTransactions(_customerId: number, limit: number): Promise<Transaction[]> {
    return DEMO_TRANSACTIONS.slice(0, Math.max(0, limit));
  }

  async blockCard(_customerId: number): Promise<boolean> {
    return true;
  }
}
