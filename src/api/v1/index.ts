import { type Context, Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { z } from "zod";
import { requireUser, type AppContext } from "../auth";
import { LedgerError } from "../../ledger/errors";
import { summarizeMonth, summarizeYear } from "../../reports/monthly";
import { toTransactionRecord, type Transaction } from "../../transactions/transaction";
import type { MonthSummary, YearSummary } from "../../types";

const router = new Hono<AppContext>();

const amountSchema = z.union([z.string(), z.number()]);

const createBudgetSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string(),
  initialFunding: amountSchema,
  goalLimit: amountSchema.nullable().optional(),
});

const entrySchema = z.object({
  amount: amountSchema,
  category: z.string(),
  description: z.string().optional(),
  occurredOn: z.string().optional(),
});

const resetSchema = z.object({
  goalLimit: amountSchema,
});

const exceedingQuerySchema = z.object({
  ceiling: z.string().optional(),
});

const amountResponseSchema = z.string();

const monthSummaryResponseSchema = z.object({
  month: z.number(),
  label: z.string(),
  incomeTotal: amountResponseSchema,
  expenseTotal: amountResponseSchema,
  balance: amountResponseSchema,
  goalLimit: amountResponseSchema.nullable(),
  remaining: amountResponseSchema.nullable(),
  exceeded: z.boolean(),
});

const yearSummaryResponseSchema = z.object({
  budgetId: z.string(),
  name: z.string(),
  months: z.array(monthSummaryResponseSchema).length(12),
  totalIncome: amountResponseSchema,
  totalExpenses: amountResponseSchema,
  balance: amountResponseSchema,
  exceeded: z.boolean(),
  exceededMonths: z.array(z.number()),
});

const transactionResponseSchema = z.object({
  id: z.string(),
  amount: amountResponseSchema,
  kind: z.enum(["income", "expense"]),
  category: z.string(),
  description: z.string(),
  occurredOn: z.string(),
});

const incomeResponseSchema = z.object({
  transaction: transactionResponseSchema,
  month: monthSummaryResponseSchema,
});

const expenseResponseSchema = incomeResponseSchema.extend({
  exceeded: z.boolean(),
});

const transactionListResponseSchema = z.object({
  transactions: z.array(transactionResponseSchema),
});

const totalsResponseSchema = z.object({
  totalIncome: amountResponseSchema,
  totalExpenses: amountResponseSchema,
  netBalance: amountResponseSchema,
});

const categoriesResponseSchema = z.object({
  categories: z.record(amountResponseSchema),
});

function respond<T extends z.ZodTypeAny>(
  c: Context<AppContext>,
  schema: T,
  payload: unknown,
  status: 200 | 201 = 200,
) {
  const parsed = schema.parse(payload);
  return c.json(parsed, status);
}

async function readJson(c: Context<AppContext>): Promise<unknown> {
  try {
    return await c.req.json();
  } catch (error) {
    throw new HTTPException(400, { message: "INVALID_JSON", cause: error });
  }
}

function presentMonth(summary: MonthSummary) {
  return {
    ...summary,
    incomeTotal: summary.incomeTotal.toString(),
    expenseTotal: summary.expenseTotal.toString(),
    balance: summary.balance.toString(),
    goalLimit: summary.goalLimit?.toString() ?? null,
    remaining: summary.remaining?.toString() ?? null,
  };
}

function presentYear(summary: YearSummary) {
  return {
    ...summary,
    months: summary.months.map(presentMonth),
    totalIncome: summary.totalIncome.toString(),
    totalExpenses: summary.totalExpenses.toString(),
    balance: summary.balance.toString(),
  };
}

function presentTransactions(transactions: readonly Transaction[]) {
  return { transactions: transactions.map(toTransactionRecord) };
}

router.post("/budget", async (c) => {
  const user = requireUser(c);
  const session = c.get("session");
  const body = createBudgetSchema.parse(await readJson(c));
  if (session.hasBudget(user.userId)) {
    throw new HTTPException(409, { message: "BUDGET_EXISTS" });
  }
  const budget = session.createBudget(user.userId, body);
  return respond(c, yearSummaryResponseSchema, presentYear(summarizeYear(budget)), 201);
});

router.get("/budget", (c) => {
  const user = requireUser(c);
  const budget = c.get("session").getBudget(user.userId);
  return respond(c, yearSummaryResponseSchema, presentYear(summarizeYear(budget)));
});

router.get("/budget/months/:month", (c) => {
  const user = requireUser(c);
  const budget = c.get("session").getBudget(user.userId);
  const summary = summarizeMonth(budget, Number(c.req.param("month")));
  return respond(c, monthSummaryResponseSchema, presentMonth(summary));
});

router.post("/budget/income", async (c) => {
  const user = requireUser(c);
  const session = c.get("session");
  const entry = entrySchema.parse(await readJson(c));
  const recorded = session.recordIncome(user.userId, entry);
  const month = summarizeMonth(session.getBudget(user.userId), recorded.month);
  return respond(
    c,
    incomeResponseSchema,
    { transaction: toTransactionRecord(recorded.transaction), month: presentMonth(month) },
    201,
  );
});

router.post("/budget/expenses", async (c) => {
  const user = requireUser(c);
  const session = c.get("session");
  const entry = entrySchema.parse(await readJson(c));
  const { transaction, outcome } = session.recordExpense(user.userId, entry);
  const month = summarizeMonth(session.getBudget(user.userId), outcome.month);
  return respond(
    c,
    expenseResponseSchema,
    {
      transaction: toTransactionRecord(transaction),
      month: presentMonth(month),
      exceeded: outcome.exceeded,
    },
    201,
  );
});

router.post("/budget/reset", async (c) => {
  const user = requireUser(c);
  const body = resetSchema.parse(await readJson(c));
  const budget = c.get("session").resetBudget(user.userId, body.goalLimit);
  return respond(c, yearSummaryResponseSchema, presentYear(summarizeYear(budget)));
});

router.get("/transactions", (c) => {
  const user = requireUser(c);
  const transactions = c.get("session").transactions.list(user.userId);
  return respond(c, transactionListResponseSchema, presentTransactions(transactions));
});

router.get("/transactions/totals", (c) => {
  const user = requireUser(c);
  const summary = c.get("session").transactions.summary(user.userId);
  return respond(c, totalsResponseSchema, {
    totalIncome: summary.totalIncome.toString(),
    totalExpenses: summary.totalExpenses.toString(),
    netBalance: summary.netBalance.toString(),
  });
});

router.get("/transactions/categories", (c) => {
  const user = requireUser(c);
  const totals = c.get("session").transactions.totalsByCategory(user.userId);
  const categories = Object.fromEntries(
    Object.entries(totals).map(([category, total]) => [category, total.toString()]),
  );
  return respond(c, categoriesResponseSchema, { categories });
});

router.get("/transactions/exceeding", (c) => {
  const user = requireUser(c);
  const session = c.get("session");
  const query = exceedingQuerySchema.parse(c.req.query());
  const goalLimit = session.getBudget(user.userId).goalLimit;
  const ceiling = query.ceiling ?? (goalLimit?.isPositive() ? goalLimit : null);
  if (ceiling === null) {
    throw new LedgerError("INVALID_AMOUNT", "A ceiling is required when the budget has no goal limit.");
  }
  const transactions = session.transactions.exceeding(user.userId, ceiling);
  return respond(c, transactionListResponseSchema, presentTransactions(transactions));
});

router.post("/session/save", async (c) => {
  const user = requireUser(c);
  await c.get("session").save(user.userId);
  return c.json({ saved: true });
});

router.post("/session/load", async (c) => {
  const user = requireUser(c);
  const loaded = await c.get("session").load(user.userId);
  return c.json({ loaded });
});

export { router as apiRouter };
