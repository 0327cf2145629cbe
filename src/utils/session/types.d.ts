import { DateString } from '../date/types';

export type Session = {
  id: string;
  // Date last picked on the entry forms; null until the user picks one
  selectedDate: DateString | null;
  createdAt: string;
};
