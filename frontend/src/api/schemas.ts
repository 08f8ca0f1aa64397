import { z } from 'zod';

export const CurrentTimeResponseSchema = z.object({
  'Current Simulation Time': z.object({
    Date: z.string(),
    Time: z.string(),
    Weekday: z.string(),
  }),
});

export const UsageSeriesSchema = z
  .object({
    dates: z.array(z.string()),
    usage: z.array(z.number()),
    total_usage: z.number().optional(),
    average_usage: z.number().optional(),
  })
  .refine((series) => series.dates.length === series.usage.length, {
    message: 'dates and usage must have the same length',
  });

export const MonthlyHistorySchema = z
  .object({
    months: z.array(z.string()),
    usage: z.array(z.number()),
    days: z.array(z.number().int().nonnegative()),
  })
  .refine(
    (history) =>
      history.months.length === history.usage.length &&
      history.months.length === history.days.length,
    { message: 'months, usage and days must have the same length' },
  );

export const AreaCatalogSchema = z.record(z.string(), z.array(z.string()));

export const RegisteredAccountSchema = z.object({
  meter_ID: z.string(),
  area: z.string(),
  dwelling: z.string(),
  register_time: z.string(),
});

export const RegisterResponseSchema = z.discriminatedUnion('success', [
  z.object({ success: z.literal(true), account: RegisteredAccountSchema }),
  z.object({ success: z.literal(false), message: z.string().optional() }),
]);
