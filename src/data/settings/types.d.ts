export type Settings = {
  users: string[];
  categories: string[];
  paymentMethods: string[];
  incomeSources: string[];
  periodAnchorDay: number; // 1 through 28
  recentLimit: number;
};
