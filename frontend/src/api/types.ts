import type { z } from 'zod';
import type {
  AreaCatalogSchema,
  MonthlyHistorySchema,
  RegisteredAccountSchema,
  UsageSeriesSchema,
} from './schemas';

export interface SimulationTime {
  date: string;
  time: string;
  weekday: string;
}

export const COLLECTION_UNITS = ['minutes', 'hours', 'days', 'months'] as const;
export type CollectionUnit = (typeof COLLECTION_UNITS)[number];

export interface CollectionCommand {
  value: number;
  unit: CollectionUnit;
}

export const TIME_RANGES = ['today', 'last_7_days', 'this_month', 'last_month'] as const;
export type TimeRange = (typeof TIME_RANGES)[number];

export type UsageSeries = z.infer<typeof UsageSeriesSchema>;
export type MonthlyHistory = z.infer<typeof MonthlyHistorySchema>;
export type AreaCatalog = z.infer<typeof AreaCatalogSchema>;
export type RegisteredAccount = z.infer<typeof RegisteredAccountSchema>;

export const DWELLING_TYPES = [
  'Apartment',
  'Detached house',
  'Semi-detached house',
  'Terraced house',
  'Bungalow',
] as const;
export type DwellingType = (typeof DWELLING_TYPES)[number];

export interface RegistrationRequest {
  meterId: string;
  area: string;
  dwelling: DwellingType;
}
