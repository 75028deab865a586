/**
 * Configuration: one way of invoking the system under test.
 *
 * A configuration is validated once, frozen, and identified by a hash of its
 * canonical serialization, so equal attributes always give the same id.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { ConfigurationError, formatIssues } from './errors.js';

export type OutputFormat = 'free_text' | 'structured';

export const DEFAULT_TEMPERATURE = 0.3;
export const DEFAULT_MAX_OUTPUT_TOKENS = 3000;

export const configurationSchema = z
  .object({
    modelId: z.string().min(1),
    modelVersion: z.string().nullish(),
    temperature: z.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
    topK: z.number().int().positive().nullish(),
    topP: z.number().min(0).max(1).nullish(),
    maxOutputTokens: z.number().int().positive().default(DEFAULT_MAX_OUTPUT_TOKENS),
    systemInstruction: z.string().nullish(),
    outputFormat: z.enum(['free_text', 'structured']).default('free_text'),
    /** Passed through to the system under test; never interpreted here. */
    outputSchema: z.record(z.string(), z.unknown()).nullish(),
  })
  .strict();

export type ConfigurationInput = z.input<typeof configurationSchema>;

/**
 * Every attribute of a configuration, absent optionals normalized to null.
 */
export interface ConfigurationAttributes {
  readonly modelId: string;
  readonly modelVersion: string | null;
  readonly temperature: number;
  readonly topK: number | null;
  readonly topP: number | null;
  readonly maxOutputTokens: number;
  readonly systemInstruction: string | null;
  readonly outputFormat: OutputFormat;
  readonly outputSchema: Readonly<Record<string, unknown>> | null;
}

export interface Configuration extends ConfigurationAttributes {
  /** Content-derived identifier, see `configurationId`. */
  readonly id: string;
}

/**
 * Validate and freeze a configuration.
 */
export function createConfiguration(input: ConfigurationInput): Configuration {
  const parsed = configurationSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  const data = parsed.data;

  const attributes: ConfigurationAttributes = {
    modelId: data.modelId,
    modelVersion: data.modelVersion ?? null,
    temperature: data.temperature,
    topK: data.topK ?? null,
    topP: data.topP ?? null,
    maxOutputTokens: data.maxOutputTokens,
    systemInstruction: data.systemInstruction ?? null,
    outputFormat: data.outputFormat,
    outputSchema: data.outputSchema ? deepFreeze(structuredClone(data.outputSchema)) : null,
  };

  return Object.freeze({ ...attributes, id: configurationId(attributes) });
}

/**
 * Deterministic identifier: first 16 hex chars of the SHA-256 of the canonical JSON
 * of all attributes. Construction order of the fields has no effect.
 */
export function configurationId(attributes: ConfigurationAttributes): string {
  const canonical = canonicalJson({
    modelId: attributes.modelId,
    modelVersion: attributes.modelVersion,
    temperature: attributes.temperature,
    topK: attributes.topK,
    topP: attributes.topP,
    maxOutputTokens: attributes.maxOutputTokens,
    systemInstruction: attributes.systemInstruction,
    outputFormat: attributes.outputFormat,
    outputSchema: attributes.outputSchema,
  });
  return createHash('sha256').update(canonical).digest('hex').slice(0, 16);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const member of Object.values(value)) deepFreeze(member);
    Object.freeze(value);
  }
  return value;
}

/**
 * JSON with object keys sorted at every depth. Undefined object members are dropped.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value)) ?? 'null';
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => (item === undefined ? null : canonicalize(item)));
  }
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const [key, member] of Object.entries(value).sort(([a], [b]) => compareKeys(a, b))) {
      if (member !== undefined) sorted[key] = canonicalize(member);
    }
    return sorted;
  }
  return value;
}

// Code-unit order, independent of locale.
function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
