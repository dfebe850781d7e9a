/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const ImagesConfigSchema = z.object({
  directory: z.string().min(1),
  attempts: z.number().int().positive(),
  retryDelay: z.number().int().nonnegative(), // In milliseconds
  timeout: z.number().int().positive(), // In milliseconds
  headers: z.record(z.string(), z.string()),
});

export const ApiConfigSchema = z.object({
  baseUrl: z.string().url(),
  // Jikan allows roughly 3 requests per second
  requestDelay: z.number().int().min(500),
  rateLimitDelay: z.number().int().min(2000),
  timeout: z.number().int().positive(),
});

export const DisplayConfigSchema = z.object({
  width: z.number().int().positive(),
  placeholder: z.string(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]),
});

export const AppConfigSchema = z.object({
  images: ImagesConfigSchema,
  api: ApiConfigSchema,
  display: DisplayConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialAppConfigSchema = z.object({
  images: ImagesConfigSchema.partial().optional(),
  api: ApiConfigSchema.partial().optional(),
  display: DisplayConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type ApiConfig = z.infer<typeof ApiConfigSchema>;
export type LogLevel = z.infer<typeof LoggingConfigSchema>["level"];
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type PartialAppConfig = z.infer<typeof PartialAppConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
