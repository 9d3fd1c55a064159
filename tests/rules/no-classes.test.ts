import { describe, it, expect } from 'vitest';
import { noClasses } from '../../src/rules/no-classes.js';
import { lintSnippet, messagesOf } from '../helpers/lint-snippet.js';

describe('no-classes', () => {
  it('flags class declarations', () => {
    const diagnostics = lintSnippet('class Counter {}\n', [noClasses]);
    expect(messagesOf(diagnostics)).toEqual(['Classes are not allowed except when extending Error']);
    expect(diagnostics[0]?.line).toBe(1);
    expect(diagnostics[0]?.column).toBe(1);
  });

  it('flags class expressions', () => {
    const diagnostics = lintSnippet('const Counter = class {};\n', [noClasses]);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]?.column).toBe(17);
  });

  it('allows classes that extend Error', () => {
    expect(lintSnippet('class ParseError extends Error {}\n', [noClasses])).toHaveLength(0);
  });

  it('allows any class inside an errors directory', () => {
    const diagnostics = lintSnippet('class Helper {}\n', [noClasses], { filePath: 'src/errors/Helper.ts' });
    expect(diagnostics).toHaveLength(0);
  });

  it('has correct metadata', () => {
    expect(noClasses.id).toBe('no-classes');
    expect(noClasses.visitors).toHaveProperty('ClassDeclaration');
    expect(noClasses.visitors).toHaveProperty('ClassExpression');
  });
});
