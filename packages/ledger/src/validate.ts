// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { z } from 'zod';
import { InvalidConfigError, InvalidInputError } from './errors.js';
import { toDateKey } from './normalize.js';
import type { DateKey } from './types.js';

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Validate an input against its schema, throwing InvalidInputError on
 * failure. Ledger backends run every write through this before touching
 * storage.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new InvalidInputError(describeIssues(result.error));
  }
  return result.data;
}

/**
 * Parse and validate a raw config object, throwing InvalidConfigError on
 * failure.
 */
export function parseConfig<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigError(describeIssues(result.error));
  }
  return result.data;
}

/**
 * Turn a validated date input into its `YYYY-MM-DD` key. Zod accepts any
 * well-formed key, so impossible calendar dates such as `2025-02-30` are
 * rejected here.
 */
export function requireDateKey(value: string | Date, field: string): DateKey {
  const key = toDateKey(value);
  if (key === null) {
    throw new InvalidInputError([`${field}: Invalid calendar date`]);
  }
  return key;
}
