import { DateString } from '../../utils/date/types';

export type AccountingPeriod = {
  readonly start: Date;
  // Exclusive
  readonly end: Date;
};

export type CategoryTotal = {
  category: string;
  amount: number;
};

export type UserTotal = {
  user: string;
  amount: number;
};

export type SourceTotal = {
  source: string;
  amount: number;
};

export type BudgetComparison = {
  category: string;
  allocations: Record<string, number>;
  totalBudget: number;
  amountSpent: number;
  remaining: number;
  overBudget: boolean;
};

export type BudgetDisplayRow = {
  category: string;
  allocations: Record<string, string>;
  totalBudget: string;
  amountSpent: string;
  remaining: string;
  overBudget: boolean;
};

export type BudgetChartBar = {
  label: string;
  budget: number;
  spent: number;
  color: string;
};

export type RecentTransaction = {
  timestamp: string | null;
  user: string;
  purchaseDate: string;
  item: string;
  amount: number;
  category: string;
  paymentMethod: string;
};

export type DroppedRows = {
  expenses: number;
  income: number;
  budget: number;
};

export type DashboardReport = {
  period: {
    start: DateString;
    end: DateString;
  };
  categories: CategoryTotal[];
  users: UserTotal[];
  budget: {
    rows: BudgetComparison[];
    display: BudgetDisplayRow[];
    chart: BudgetChartBar[];
  };
  income: SourceTotal[];
  totals: {
    spent: number;
    income: number;
    net: number;
  };
  recent: RecentTransaction[];
  dropped: DroppedRows;
  formDefaults: {
    date: DateString;
  };
};
