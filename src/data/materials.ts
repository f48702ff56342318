// data/materials.ts — Material catalog

import type { Material, Settings } from '../types/index.js';
import { UnknownMaterial } from '../shared/errors.js';
import { FOO_MINING_TICKS } from '../shared/constants.js';
import type { RandomSource } from '../factory/rng.js';

export const MATERIALS: readonly Material[] = [
  { name: 'foo', source: 'foo-mine', extraction: { kind: 'fixed', seconds: FOO_MINING_TICKS } },
  { name: 'bar', source: 'bar-mine', extraction: { kind: 'ranged' } },
];

const MATERIAL_MAP = new Map<string, Material>();
for (const material of MATERIALS) {
  MATERIAL_MAP.set(material.name, material);
}

/** @throws UnknownMaterial */
export function materialFromName(name: string): Material {
  const material = MATERIAL_MAP.get(name.trim().toLowerCase());
  if (!material) throw new UnknownMaterial(name);
  return material;
}

/**
 * Seconds needed to extract one unit. Ranged materials are sampled here,
 * so call this when mining starts, not when the material is looked up.
 */
export function extractionTime(material: Material, settings: Settings, rng: RandomSource): number {
  switch (material.extraction.kind) {
    case 'fixed':
      return material.extraction.seconds;
    case 'ranged': {
      const { min, max } = settings.miningBarRangeTime;
      return rng.nextInt(min, max);
    }
  }
}
