import { z } from 'zod';

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';

const OllamaSettingsSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_OLLAMA_URL),
  requestTimeoutMs: z.number().int().positive().default(5000),
  embeddingTimeoutMs: z.number().int().positive().default(30000),
});

const EmbeddingSettingsSchema = z.object({
  defaultModel: z.string().min(1).optional(),
});

const FigureSettingsSchema = z.object({
  width: z.number().int().min(200).max(10000).default(2000),
  height: z.number().int().min(100).max(10000).default(800),
});

const ServerSettingsSchema = z.object({
  port: z.number().int().min(1).max(65535).default(3000),
});

export const EmbedLensConfigSchema = z.object({
  $schema: z.string().optional(),
  ollama: OllamaSettingsSchema.default({}),
  embedding: EmbeddingSettingsSchema.default({}),
  figure: FigureSettingsSchema.default({}),
  server: ServerSettingsSchema.default({}),
});

export type EmbedLensConfig = z.infer<typeof EmbedLensConfigSchema>;
export type OllamaSettings = z.infer<typeof OllamaSettingsSchema>;
export type FigureSettings = z.infer<typeof FigureSettingsSchema>;
