/**
 * TestCase: one fixed input plus the criteria a correct output must satisfy.
 */

import { z } from 'zod';
import { formatIssues, TestCaseError } from './errors.js';

export type ExpectedOutputKind = 'any' | 'numeric' | 'structured';

/**
 * Result of a custom validation function.
 * `qualityMultiplier` defaults to 1 and `valid` to true.
 */
export interface CustomVerdict {
  valid?: boolean;
  issues?: string[];
  qualityMultiplier?: number;
}

/**
 * Case-specific check run after the built-in type and pattern checks.
 * May return synchronously or a Promise (e.g. when it calls a Scorer).
 */
export type CustomValidation<TInput = unknown> = (
  output: unknown,
  testCase: TestCase<TInput>,
) => boolean | CustomVerdict | Promise<boolean | CustomVerdict>;

export interface TestCase<TInput = unknown> {
  /** Unique within a run; statistics for equal ids are merged. */
  readonly id: string;
  readonly name: string;
  /** Passed verbatim to the system under test. */
  readonly input: TInput;
  readonly expectedPattern: RegExp | null;
  readonly expectedKind: ExpectedOutputKind;
  readonly validate: CustomValidation<TInput> | null;
  /** Informational label; the analyzer derives difficulty from results instead. */
  readonly difficulty: string;
  readonly category: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface TestCaseInput<TInput = unknown> {
  id: string;
  name?: string;
  input: TInput;
  expectedPattern?: string | RegExp | null;
  expectedKind?: ExpectedOutputKind;
  validate?: CustomValidation<TInput> | null;
  difficulty?: string;
  category?: string;
  metadata?: Record<string, unknown>;
}

const testCaseFieldsSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).optional(),
  expectedPattern: z.union([z.string(), z.instanceof(RegExp)]).nullish(),
  expectedKind: z.enum(['any', 'numeric', 'structured']).default('any'),
  difficulty: z.string().default('medium'),
  category: z.string().default('general'),
  metadata: z.record(z.string(), z.unknown()).default({}),
});

/**
 * Validate and freeze a test case.
 */
export function createTestCase<TInput>(input: TestCaseInput<TInput>): TestCase<TInput> {
  const parsed = testCaseFieldsSchema.safeParse({
    id: input.id,
    name: input.name,
    expectedPattern: input.expectedPattern,
    expectedKind: input.expectedKind,
    difficulty: input.difficulty,
    category: input.category,
    metadata: input.metadata,
  });
  if (!parsed.success) {
    throw new TestCaseError(`Invalid test case '${input.id}': ${formatIssues(parsed.error)}`);
  }
  if (input.validate != null && typeof input.validate !== 'function') {
    throw new TestCaseError(`Invalid test case '${input.id}': validate must be a function`);
  }

  const fields = parsed.data;
  return Object.freeze({
    id: fields.id,
    name: fields.name ?? fields.id,
    input: input.input,
    expectedPattern: compilePattern(fields.id, fields.expectedPattern ?? null),
    expectedKind: fields.expectedKind,
    validate: input.validate ?? null,
    difficulty: fields.difficulty,
    category: fields.category,
    metadata: Object.freeze({ ...fields.metadata }),
  });
}

// Matching uses search semantics; stateful flags would make repeated tests disagree.
function compilePattern(id: string, pattern: string | RegExp | null): RegExp | null {
  if (pattern === null) return null;
  if (pattern instanceof RegExp) {
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  }
  try {
    return new RegExp(pattern);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new TestCaseError(`Invalid test case '${id}': bad expected pattern: ${message}`);
  }
}
