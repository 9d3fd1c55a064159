export const FEATURES = ['timers', 'console', 'net', 'dom', 'throws'] as const;

export type Feature = (typeof FEATURES)[number];

export type FeatureFlags = Record<Feature, boolean>;

export interface FeatureGate {
  readonly allowed: Readonly<FeatureFlags>;
  readonly used: FeatureFlags;
}

function isFeature(token: string): token is Feature {
  return FEATURES.some((feature) => feature === token);
}

function noFeatures(): FeatureFlags {
  return { timers: false, console: false, net: false, dom: false, throws: false };
}

/**
 * Reads `@allow <feature>` lines from the first `/** ... *\/` block in the
 * file. Unknown feature names are ignored.
 */
export function parseAllowedFeatures(source: string): FeatureFlags {
  const features = noFeatures();
  const blockStart = source.indexOf('/**');
  if (blockStart === -1) return features;
  const blockEnd = source.indexOf('*/', blockStart + 3);
  if (blockEnd === -1) return features;

  const block = source.slice(blockStart + 3, blockEnd);
  for (const rawLine of block.split('\n')) {
    const line = rawLine.trim().replace(/^\*+/, '').trim();
    if (!line.startsWith('@allow ')) continue;
    const [token = ''] = line.slice('@allow '.length).trim().split(/\s+/);
    if (isFeature(token)) features[token] = true;
  }

  return features;
}

export function createFeatureGate(source: string): FeatureGate {
  return { allowed: parseAllowedFeatures(source), used: noFeatures() };
}

export function unusedFeatures(gate: FeatureGate): Feature[] {
  return FEATURES.filter((feature) => gate.allowed[feature] && !gate.used[feature]);
}
