import { silentLogger } from '@circles/core';
import sampleTree from './data/fallback-taxonomy.json';
import { FlattenedTaxonomy, decodeTaxonomyTree } from './models';

let decoded: FlattenedTaxonomy | null = null;

/**
 * Offline sample taxonomy shown when the backend cannot be reached.
 * Results built from it are always tagged `source: 'fallback'`.
 */
export function fallbackTaxonomy(): FlattenedTaxonomy {
  if (!decoded) decoded = decodeTaxonomyTree(sampleTree, silentLogger);
  return decoded;
}
