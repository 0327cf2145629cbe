// YYYY-MM-DD
export type DateString = string;
