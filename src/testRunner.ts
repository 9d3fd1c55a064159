import { calleeMember, calleeName, type AstNode } from './analysis/ast.js';

export const TEST_RUNNER_NAMES = ['vitest', 'node-test', 'deno-test'] as const;

export type TestRunnerName = (typeof TEST_RUNNER_NAMES)[number];

export interface TestRunner {
  name: TestRunnerName;
  /** Substrings that identify an import from this runner. */
  importPatterns: readonly string[];
  /** Registration calls, as `name` or `object.name`. */
  testFunctions: readonly string[];
}

export const testRunners: Readonly<Record<TestRunnerName, TestRunner>> = {
  vitest: {
    name: 'vitest',
    importPatterns: ['vitest', '@vitest/'],
    testFunctions: ['describe', 'it', 'test', 'beforeEach', 'afterEach'],
  },
  'node-test': {
    name: 'node-test',
    importPatterns: ['node:test', 'node:assert'],
    testFunctions: ['describe', 'it', 'test', 'before', 'after'],
  },
  'deno-test': {
    name: 'deno-test',
    importPatterns: [
      'deno.land/std/testing',
      'deno.land/std/assert',
      '@std/expect',
      '@std/assert',
      'jsr:@std/expect',
      'jsr:@std/assert',
    ],
    testFunctions: ['Deno.test'],
  },
};

export function isTestRunnerName(value: string): value is TestRunnerName {
  return TEST_RUNNER_NAMES.some((name) => name === value);
}

export function matchesImport(runner: TestRunner, source: string): boolean {
  return runner.importPatterns.some((pattern) => source.includes(pattern));
}

function registrationName(call: AstNode): string | undefined {
  const member = calleeMember(call);
  if (!member) return calleeName(call);
  return member.objectName === undefined ? undefined : `${member.objectName}.${member.propertyName}`;
}

export function isRegistrationCall(runner: TestRunner, call: AstNode): boolean {
  const name = registrationName(call);
  return name !== undefined && runner.testFunctions.includes(name);
}
