import { z } from "zod";

export const ERROR_CORRECTION_LEVELS = ["L", "M", "Q", "H"] as const;
export type ErrorCorrectionLevel = (typeof ERROR_CORRECTION_LEVELS)[number];

/** Case-insensitive; anything unrecognised becomes "M". */
export function normalizeErrorCorrection(value: string): ErrorCorrectionLevel {
  const upper = value.trim().toUpperCase();
  return ERROR_CORRECTION_LEVELS.find((level) => level === upper) ?? "M";
}

export const GENERATION_DEFAULTS = {
  fill_color: "#111827",
  back_color: "#ffffff",
  box_size: 10,
  border: 4,
  error_correction: "M",
  rounded: true,
} as const;

export const generationRequestSchema = z.object({
  content: z.string().describe("Text or URL encoded in the QR code"),
  fill_color: z
    .string()
    .default(GENERATION_DEFAULTS.fill_color)
    .describe("QR code color"),
  back_color: z
    .string()
    .default(GENERATION_DEFAULTS.back_color)
    .describe("Background color"),
  box_size: z
    .number()
    .int()
    .min(1)
    .max(50)
    .default(GENERATION_DEFAULTS.box_size)
    .describe("Pixel size of each QR box"),
  border: z
    .number()
    .int()
    .min(0)
    .max(20)
    .default(GENERATION_DEFAULTS.border)
    .describe("Border size (modules)"),
  error_correction: z
    .string()
    .default(GENERATION_DEFAULTS.error_correction)
    .transform(normalizeErrorCorrection)
    .describe("Error correction level: L, M, Q, H"),
  rounded: z.boolean().default(GENERATION_DEFAULTS.rounded),
  logo_url: z
    .string()
    .nullish()
    .describe("Optional logo URL to embed in center"),
});

export type GenerationRequest = z.infer<typeof generationRequestSchema>;

export interface HistoryRecord {
  content: string;
  fill_color: string;
  back_color: string;
  box_size: number;
  border: number;
  error_correction: string;
  logo_url: string | null;
}

export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(12),
});

export type DocumentData = Record<string, unknown>;
