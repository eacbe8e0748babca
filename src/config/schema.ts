/**
 * Configuration Schema
 *
 * Shape of `.leakguard.json` and of the bundled default catalog.
 */

import { z } from 'zod';
import { ConfidenceClass } from '../shared/types.js';

export const secretPatternSchema = z
  .object({
    pattern: z.string().min(1),
    category: z.string().min(1),
    confidence: z.nativeEnum(ConfidenceClass),
    flags: z.string().optional(),
  })
  .strict();

const allowlistObjectSchema = z
  .object({
    pattern: z.string().min(1),
    description: z.string().optional(),
  })
  .strict();

/** Allowlist entries may be written as a bare pattern string. */
export const allowlistEntrySchema = z.union([z.string().min(1), allowlistObjectSchema]);

export const excludePathEntrySchema = z.union([
  z.string().min(1),
  z.object({ pattern: z.string().min(1) }).strict(),
]);

export const entropySchema = z
  .object({
    /** Matches shorter than this score 0. */
    minLength: z.number().int().min(1).default(16),
    /** A match is high confidence when its score exceeds this. */
    threshold: z.number().int().min(0).default(8),
  })
  .strict();

export const displaySchema = z
  .object({
    maxMatchLength: z.number().int().min(8).default(60),
    maxSnippetLength: z.number().int().min(8).default(100),
  })
  .strict();

export const configFileSchema = z
  .object({
    /** Start from the built-in catalog (true) or replace it (false). */
    useDefaults: z.boolean().default(true),
    secretPatterns: z.array(secretPatternSchema).default([]),
    allowlist: z.array(allowlistEntrySchema).default([]),
    excludePaths: z.array(excludePathEntrySchema).default([]),
    entropy: entropySchema.default({}),
    display: displaySchema.default({}),
    maxScanTimeMs: z.number().int().positive().optional(),
  })
  .strict();

export const catalogFileSchema = z
  .object({
    secretPatterns: z.array(secretPatternSchema),
    allowlist: z.array(allowlistObjectSchema),
    excludePaths: z.array(z.string().min(1)),
  })
  .strict();

export type ConfigFileInput = z.input<typeof configFileSchema>;
export type ConfigFile = z.output<typeof configFileSchema>;
export type EntropySettings = z.output<typeof entropySchema>;
export type DisplaySettings = z.output<typeof displaySchema>;
