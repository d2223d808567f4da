import { InstitutionProfile } from './profiles/institution-profile.js';
import { loadProfileTable } from './profiles/loader.js';

/**
 * Detection priority. When a statement mentions more than one issuer (co-branded or
 * rebranded cards), the issuer listed first here wins.
 */
export const REGISTRY_ORDER = ['hdfc', 'icici', 'sbi', 'axis', 'amex'] as const;

export type ProfileId = (typeof REGISTRY_ORDER)[number];

export type ProfileRegistry = readonly InstitutionProfile[];

export function createRegistry(profiles: readonly InstitutionProfile[]): ProfileRegistry {
  const seen = new Set<string>();
  for (const profile of profiles) {
    if (seen.has(profile.id)) {
      throw new Error(`Duplicate profile id in registry: ${profile.id}`);
    }
    seen.add(profile.id);
  }
  return Object.freeze([...profiles]);
}

export function loadDefaultRegistry(): ProfileRegistry {
  return createRegistry(REGISTRY_ORDER.map((id) => InstitutionProfile.fromTable(loadProfileTable(id))));
}

/** Built once at module load; every parse shares these compiled rules. */
export const DEFAULT_REGISTRY: ProfileRegistry = loadDefaultRegistry();

export function getSupportedIssuers(registry: ProfileRegistry = DEFAULT_REGISTRY): string[] {
  return registry.map((profile) => profile.issuerName);
}

export function getProfile(id: ProfileId, registry: ProfileRegistry = DEFAULT_REGISTRY): InstitutionProfile | undefined {
  return registry.find((profile) => profile.id === id);
}
