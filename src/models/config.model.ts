/**
 * Zod schema for the application configuration
 *
 * The configuration is built once at startup (see config/config-loader.ts)
 * and handed to the store, engine and CLI explicitly.
 */

import { z } from 'zod';

export const logLevelEnum = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Fixed option count, or a range drawn once per session
 */
export const optionCountSchema = z.union([
  z.number().int().min(1),
  z
    .object({
      min: z.number().int().min(1),
      max: z.number().int().min(1),
    })
    .refine(range => range.min <= range.max, { message: 'min must not exceed max' }),
]);

export const difficultyPresetSchema = z.object({
  key: z.string().min(1),
  label: z.string().min(1),
  maxQuestions: z.number().int().min(1),
  optionCount: optionCountSchema,
});

export const keywordConfigSchema = z.object({
  booleanTokens: z.object({
    true: z.string().min(1),
    false: z.string().min(1),
  }),
  excludedTokens: z.array(z.string()).default([]),
  booleanKeywords: z.array(z.string().min(1)).default([]),
  groupingKeywords: z.array(z.string().min(1)).default([]),
});

export const answerMatchingSchema = z.object({
  caseSensitive: z.boolean(),
  stripFormatting: z.boolean(),
});

export const flashcardConfigSchema = z.object({
  paths: z.object({
    questionsDir: z.string().min(1),
    logDir: z.string().min(1),
    exportDir: z.string().min(1),
  }),
  bankExtension: z.string().regex(/^\.[A-Za-z0-9]+$/, 'must look like ".csv"'),
  clearScreen: z.boolean(),
  debug: z.boolean(),
  logLevel: logLevelEnum,
  user: z.string().min(1).optional(),
  audit: z.object({
    retentionDays: z.number().int().min(1),
  }),
  answerMatching: answerMatchingSchema,
  duplicates: z.object({
    caseSensitive: z.boolean(),
  }),
  quiz: z.object({
    exitTokens: z.array(z.string().min(1)).min(1),
    hintToken: z.string().min(1),
    defaults: z.object({
      single: difficultyPresetSchema,
      all: difficultyPresetSchema,
    }),
    presets: z.array(difficultyPresetSchema),
  }),
  keywords: keywordConfigSchema,
});

export type LogLevel = z.infer<typeof logLevelEnum>;
export type OptionCount = z.infer<typeof optionCountSchema>;
export type DifficultyPreset = z.infer<typeof difficultyPresetSchema>;
export type KeywordConfig = z.infer<typeof keywordConfigSchema>;
export type AnswerMatching = z.infer<typeof answerMatchingSchema>;
export type FlashcardConfig = z.infer<typeof flashcardConfigSchema>;
