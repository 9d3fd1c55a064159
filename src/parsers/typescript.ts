import { parseSync } from 'oxc-parser';
import { isNode, type AstNode } from '../analysis/ast.js';

export interface SourceComment {
  type: 'Line' | 'Block';
  /** Text between the delimiters. */
  value: string;
  start: number;
  end: number;
}

export interface ParsedTypeScript {
  program: AstNode | undefined;
  comments: SourceComment[];
  errors: string[];
}

function isComment(value: unknown): value is SourceComment {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    (value.type === 'Line' || value.type === 'Block') &&
    'value' in value &&
    typeof value.value === 'string' &&
    'start' in value &&
    typeof value.start === 'number' &&
    'end' in value &&
    typeof value.end === 'number'
  );
}

function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function parseTypeScript(source: string, filename: string): ParsedTypeScript {
  const result = parseSync(filename, source);
  const program: unknown = result.program;
  const comments: unknown[] = result.comments;
  const errors: unknown[] = result.errors;

  return {
    program: isNode(program) ? program : undefined,
    comments: comments
      .filter(isComment)
      .map(({ type, value, start, end }) => ({ type, value, start, end }))
      .sort((a, b) => a.start - b.start),
    errors: errors.map(errorMessage),
  };
}
