import { DemoBankDatabase, type BankDatabase } from "./bank-db";

const CUSTOMER_ID_BUCKETS = 10_000;

export type SupportDependencies = {
  customerId: number;
  db: BankDatabase;
};

/** Maps a user UUID onto the demo bank's numeric customer ids. */
export function customerIdFromUserId(userId: string): number {
  const prefix = userId.replace(/-/g, "").slice(0, 8);
  const value = Number.parseInt(prefix, 16);
  if (Number.isNaN(value)) {
    throw new Error(`Cannot derive a customer id from user id ${userId}`);
  }
  return value % CUSTOMER_ID_BUCKETS;
}

export function buildSupportDependencies(
  userId: string,
  db: BankDatabase = new DemoBankDatabase()
): SupportDependencies {
  return { customerId: customerIdFromUserId(userId), db };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSupportDependencies(value: unknown): value is SupportDependencies {
  if (!isRecord(value) || typeof value.customerId !== "number") {
    return false;
  }
  const db = value.db;
  return isRecord(db) && typeof db.customerBalance === "function";
}

/** Reads the dependency bundle a tool receives through `experimental_context`. */
export function getSupportDependencies(context: unknown): SupportDependencies {
  if (!isSupportDependencies(context)) {
    throw new Error("Bank support tools require customer dependencies in the call context");
  }
  return context;
}
