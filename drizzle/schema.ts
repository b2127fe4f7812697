import { relations, sql } from "drizzle-orm";
import {
  date,
  index,
  integer,
  numeric,
  pgTable,
  primaryKey,
  text,
  timestamp,
  uniqueIndex,
} from "drizzle-orm/pg-core";

export const budgets = pgTable("budgets", {
  userId: text("user_id").primaryKey(),
  budgetId: text("budget_id").notNull(),
  name: text("name").notNull(),
  goalLimit: numeric("goal_limit", { precision: 20, scale: 2 }),
  createdAt: timestamp("created_at", { withTimezone: true })
    .defaultNow()
    .notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .defaultNow()
    .notNull(),
});

export const budgetMonths = pgTable(
  "budget_months",
  {
    userId: text("user_id")
      .notNull()
      .references(() => budgets.userId, { onDelete: "cascade" }),
    month: integer("month").notNull(),
    incomeTotal: numeric("income_total", { precision: 20, scale: 2 })
      .notNull()
      .default(sql`0`),
    expenseTotal: numeric("expense_total", { precision: 20, scale: 2 })
      .notNull()
      .default(sql`0`),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.userId, table.month] }),
  })
);

export const ledgerTransactions = pgTable(
  "ledger_transactions",
  {
    id: text("id").notNull(),
    userId: text("user_id").notNull(),
    position: integer("position").notNull(),
    amount: numeric("amount", { precision: 20, scale: 2 }).notNull(),
    kind: text("kind").notNull(),
    category: text("category").notNull(),
    description: text("description").notNull().default(""),
    occurredOn: date("occurred_on", { mode: "string" }).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.userId, table.id] }),
    userPositionUnique: uniqueIndex("ledger_transactions_user_position_unique").on(
      table.userId,
      table.position
    ),
    userIdx: index("ledger_transactions_user_idx").on(table.userId),
  })
);

export const budgetsRelations = relations(budgets, ({ many }) => ({
  months: many(budgetMonths),
}));

export const budgetMonthsRelations = relations(budgetMonths, ({ one }) => ({
  budget: one(budgets, {
    fields: [budgetMonths.userId],
    references: [budgets.userId],
  }),
}));

