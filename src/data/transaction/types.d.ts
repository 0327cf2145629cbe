export type Expense = {
  // Missing or unreadable timestamps fall back to purchaseDate for recency
  timestamp: Date | null;
  user: string;
  purchaseDate: Date;
  item: string;
  amount: number;
  category: string;
  paymentMethod: string;
};

export type IncomeRecord = {
  timestamp: Date | null;
  user: string;
  date: Date;
  source: string;
  description: string;
  amount: number;
};

export type BudgetRow = {
  category: string;
  // Keyed by user name
  allocations: Record<string, number>;
  totalBudget: number;
};

export type ExpenseSubmission = {
  user: string;
  purchaseDate: string; // YYYY-MM-DD
  item: string;
  amount: number;
  category: string;
  paymentMethod: string;
  sessionId?: string;
};

export type IncomeSubmission = {
  user: string;
  date: string; // YYYY-MM-DD
  source: string;
  description: string;
  amount: number;
  sessionId?: string;
};
