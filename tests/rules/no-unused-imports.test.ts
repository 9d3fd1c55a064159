import { describe, it, expect } from 'vitest';
import { noUnusedImports } from '../../src/rules/no-unused-imports.js';
import { lintSnippet } from '../helpers/lint-snippet.js';

describe('no-unused-imports', () => {
  it('flags imports that are never referenced', () => {
    const source = [
      "import { used, unused } from './lib.js';",
      "import type { Shape } from './shape.js';",
      "import Default from './default.js';",
      "import * as ns from './ns.js';",
      "import { _private } from './private.js';",
      'export const area: number = used(1);',
      'export type Box = Shape;',
      '',
    ].join('\n');
    const diagnostics = lintSnippet(source, [noUnusedImports]);
    expect(diagnostics.map((d) => [d.line, d.message])).toEqual([
      [1, "Import 'unused' is declared but never used"],
      [3, "Import 'Default' is declared but never used"],
      [4, "Import 'ns' is declared but never used"],
    ]);
  });
});
