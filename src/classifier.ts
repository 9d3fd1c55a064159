export type DirectoryKind = 'types' | 'errors' | 'pure' | 'io' | 'regular';

export interface FileTraits {
  /** Forward-slash path, always with a leading `/` so segment checks match at the root. */
  normalizedPath: string;
  basename: string;
  /** File name without its extension. */
  stem: string;
  directoryKind: DirectoryKind;
  isTestFile: boolean;
  isEntryPoint: boolean;
  isMainEntry: boolean;
  isErrorFile: boolean;
}

export interface ClassifyOptions {
  entry?: readonly string[];
  main?: readonly string[];
}

const TEST_FILE_PATTERN = /(\.test|\.spec|_test)\.[cm]?tsx?$/;
const EXTENSION_PATTERN = /\.[cm]?tsx?$/;

function normalizePath(filePath: string): string {
  const forward = filePath.replace(/\\/g, '/').replace(/^\.\//, '');
  return forward.startsWith('/') ? forward : `/${forward}`;
}

function matchesAny(normalizedPath: string, candidates: readonly string[]): boolean {
  return candidates.some((candidate) => {
    const target = normalizePath(candidate);
    return normalizedPath === target || normalizedPath.endsWith(target);
  });
}

export function classifyFile(filePath: string, options: ClassifyOptions = {}): FileTraits {
  const normalizedPath = normalizePath(filePath);
  const basename = normalizedPath.split('/').pop() ?? '';
  const stem = basename.replace(EXTENSION_PATTERN, '');

  // Order matters: a types/ folder nested in errors/ is still a types file
  let directoryKind: DirectoryKind = 'regular';
  if (normalizedPath.includes('/types/')) directoryKind = 'types';
  else if (normalizedPath.includes('/errors/')) directoryKind = 'errors';
  else if (normalizedPath.includes('/pure/')) directoryKind = 'pure';
  else if (normalizedPath.includes('/io/')) directoryKind = 'io';

  return {
    normalizedPath,
    basename,
    stem,
    directoryKind,
    isTestFile: TEST_FILE_PATTERN.test(basename),
    isEntryPoint: stem === 'index' || matchesAny(normalizedPath, options.entry ?? []),
    isMainEntry: stem === 'main' || matchesAny(normalizedPath, options.main ?? []),
    isErrorFile: normalizedPath.includes('/errors/'),
  };
}

/** `add.test.ts`, `add.spec.ts` and `add_test.ts` all test `add`. */
export function testedName(traits: FileTraits): string {
  return traits.stem.replace(/(\.test|\.spec|_test)$/, '');
}
