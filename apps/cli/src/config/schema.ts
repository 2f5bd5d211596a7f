import { z } from "zod";
import { MAX_POINTS } from "@lagrange-core/constants";

const Digits = z.number().int().min(0).max(20);

export const FitSchema = z.object({
  maxPoints: z.number().int().min(1).max(MAX_POINTS),
});

export const ReportSchema = z.object({
  coefficientDigits: Digits,
  integralDigits: Digits,
});

export const PlotSchema = z.object({
  xDigits: Digits,
  estimateDigits: Digits,
});

export const AppConfigSchema = z.object({
  fit: FitSchema,
  report: ReportSchema,
  plot: PlotSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
