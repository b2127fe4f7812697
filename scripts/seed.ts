import "dotenv/config";
import { loadConfig } from "../src/config";
import { closeDb } from "../src/db/client";
import { createGateway } from "../src/persistence";
import { LedgerSession } from "../src/session/ledger-session";
import { seedLedger, type LedgerSeed } from "../src/session/seed";

const DEMO_USER = process.env.SEED_USER_ID ?? "demo-user";

const demoSeed: LedgerSeed = {
  budget: { name: "Household", initialFunding: "1000.00", goalLimit: "2000.00" },
  income: [
    { amount: "4200.00", category: "Salary", description: "Monthly salary", occurredOn: "2024-02-01" },
    { amount: "4200.00", category: "Salary", description: "Monthly salary", occurredOn: "2024-03-01" },
    { amount: "350.00", category: "Freelance", description: "Logo design", occurredOn: "2024-03-14" },
  ],
  expenses: [
    { amount: "1250.00", category: "Rent", description: "February rent", occurredOn: "2024-02-02" },
    { amount: "212.48", category: "Groceries", description: "Weekly shop", occurredOn: "2024-02-06" },
    { amount: "64.90", category: "Transport", description: "Transit pass", occurredOn: "2024-02-07" },
    { amount: "1250.00", category: "Rent", description: "March rent", occurredOn: "2024-03-02" },
    { amount: "187.15", category: "Groceries", description: "Weekly shop", occurredOn: "2024-03-05" },
    { amount: "95.00", category: "Dining", description: "Birthday dinner", occurredOn: "2024-03-09" },
  ],
};

async function main(): Promise<void> {
  const config = loadConfig();
  const session = new LedgerSession({
    gateway: createGateway(config),
    mode: config.enforcementMode,
  });

  try {
    const result = await seedLedger(session, DEMO_USER, demoSeed);
    if (!result.seeded) {
      console.log(`ℹ️  ${DEMO_USER} already has a stored ledger, nothing seeded.`);
      return;
    }
    for (const entry of result.skipped) {
      console.warn(`⚠️  Skipped ${entry.category} expense on ${entry.occurredOn}: over the goal limit`);
    }

    console.log("✅ Demo data seeded successfully:", {
      userId: DEMO_USER,
      budgetId: result.budget.id,
      storage: config.storage,
      transactions: session.transactions.list(DEMO_USER).length,
      rejected: result.skipped.length,
      balance: result.budget.balance().toString(),
    });
  } catch (error) {
    console.error("❌ Failed to seed demo data:", error);
    process.exitCode = 1;
  } finally {
    await closeDb();
  }
}

main().catch((error) => {
  console.error("❌ Unexpected error while seeding:", error);
  process.exit(1);
});
