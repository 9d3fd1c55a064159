import { describe, it, expect } from 'vitest';
import { forbiddenLibraries } from '../../src/rules/forbidden-libraries.js';
import { lintSnippet, messagesOf } from '../helpers/lint-snippet.js';

describe('forbidden-libraries', () => {
  it('flags forbidden libraries and their subpaths', () => {
    const source = "import _ from 'lodash';\nimport get from 'lodash/get';\nconst $ = require('jquery');\n";
    expect(messagesOf(lintSnippet(source, [forbiddenLibraries]))).toEqual([
      "Library 'lodash' is forbidden. Consider using modern alternatives",
      "Library 'lodash/get' is forbidden. Consider using modern alternatives",
      "Library 'jquery' is forbidden. Consider using modern alternatives",
    ]);
  });

  it('suggests replacements for argument parsers', () => {
    expect(messagesOf(lintSnippet("import minimist from 'minimist';\n", [forbiddenLibraries]))).toEqual([
      "Library 'minimist' has a better alternative. Use 'node:util parseArgs' instead",
    ]);
  });

  it('passes other packages', () => {
    expect(lintSnippet("import { z } from 'zod';\n", [forbiddenLibraries])).toHaveLength(0);
  });
});
