import type { ManifestEntry } from '../types';

export interface ManifestLookup {
  /** Resolves to null when the source is not in the manifest */
  getSource(sourceId: string): Promise<ManifestEntry | null>;
}
