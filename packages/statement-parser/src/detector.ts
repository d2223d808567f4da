import type { InstitutionProfile } from './profiles/institution-profile.js';
import { DEFAULT_REGISTRY, type ProfileRegistry } from './registry.js';

/**
 * First profile, in registry order, whose keywords occur in the text.
 * Scanning stops at that profile even if later ones would also accept the text.
 */
export function detectBank(text: string, registry: ProfileRegistry = DEFAULT_REGISTRY): InstitutionProfile | null {
  return registry.find((profile) => profile.validate(text)) ?? null;
}

/** Every accepting profile, in registry order. More than one means the text is ambiguous. */
export function detectAllBanks(text: string, registry: ProfileRegistry = DEFAULT_REGISTRY): InstitutionProfile[] {
  return registry.filter((profile) => profile.validate(text));
}
